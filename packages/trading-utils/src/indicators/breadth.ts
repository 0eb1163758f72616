/**
 * 상승/하락 종목 비율 (ADR)
 *
 * @param changePcts - 종목별 당일 등락률 (%)
 * @returns 소수 2자리 ADR. 하락 종목이 없으면 상승 종목 유무에 따라 2.0 / 1.0
 */
export function advanceDeclineRatio(changePcts: number[]): number {
  const advances = changePcts.filter((c) => c > 0).length;
  const declines = changePcts.filter((c) => c < 0).length;

  if (declines === 0) {
    return advances > 0 ? 2.0 : 1.0;
  }

  return Math.round((advances / declines) * 100) / 100;
}
