import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { toErrorMessage } from '@workspace/shared-utils';
import { env } from './env.js';

/**
 * 연도별 캘린더 데이터 로더
 * - data/*.json 을 zod로 검증한다. 형식 오류는 파일명과 함께 즉시 throw
 */

const MonthDaySchema = z.string().regex(/^\d{2}-\d{2}$/, 'MM-DD 형식이어야 합니다');
const IsoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'YYYY-MM-DD 형식이어야 합니다');
const YearKeySchema = z.string().regex(/^\d{4}$/);

export const FomcDatesSchema = z.object({
  version: z.string(),
  years: z.record(YearKeySchema, z.array(MonthDaySchema)),
});
export type FomcDates = z.infer<typeof FomcDatesSchema>;

const RebalanceWindowSchema = z.object({
  announce: IsoDateSchema,
  effective: IsoDateSchema,
});
export type RebalanceWindow = z.infer<typeof RebalanceWindowSchema>;

const IndexTypeSchema = z.enum(['msci_korea', 'kospi200', 'kospi100', 'krx300', 'kosdaq150']);

export const RebalanceEventSchema = z.object({
  indexType: IndexTypeSchema,
  stockCode: z.string(),
  stockName: z.string(),
  action: z.enum(['add', 'delete', 'weight_up', 'weight_down']),
  announcementDate: IsoDateSchema,
  effectiveDate: IsoDateSchema,
  estimatedFlow: z.number().nullable(),
  confidence: z.number().min(0).max(1),
  source: z.string(),
});

export const IndexRebalanceSchema = z.object({
  version: z.string(),
  schedules: z.object({
    msci_korea: z.record(YearKeySchema, z.array(RebalanceWindowSchema)),
    kospi200: z.record(YearKeySchema, z.array(RebalanceWindowSchema)),
  }),
  majorIndexMembers: z.array(z.string()),
  passiveWeights: z.record(z.string(), z.number()),
  flowEstimatePerTrillion: z.object({
    kospi200: z.number(),
    msci_korea: z.number(),
  }),
  predictedChanges: z.array(RebalanceEventSchema),
});
export type IndexRebalanceData = z.infer<typeof IndexRebalanceSchema>;

const SectorTypeSchema = z.enum([
  'tech',
  'semiconductor',
  'bio_pharma',
  'auto_ev',
  'battery',
  'energy',
  'defense',
  'entertainment',
  'finance',
  'retail',
]);

export const SectorEventTemplateSchema = z.object({
  name: z.string(),
  eventType: z.enum(['conference', 'exhibition', 'earnings', 'product', 'regulatory', 'seasonal']),
  sectors: z.array(SectorTypeSchema).min(1),
  start: MonthDaySchema,
  end: MonthDaySchema,
  location: z.string(),
  impactLevel: z.enum(['low', 'medium', 'high']),
  relatedStocks: z.array(z.string()),
  description: z.string(),
  tradingStrategy: z.string(),
});
export type SectorEventTemplate = z.infer<typeof SectorEventTemplateSchema>;

export const SectorEventsSchema = z.object({
  version: z.string(),
  events: z.array(SectorEventTemplateSchema),
});

const CouplingStrengthSchema = z.enum(['strong', 'moderate', 'weak', 'none']);
const CouplingSectorSchema = z.enum(['semiconductor', 'ev_battery', 'tech', 'energy', 'financial', 'default']);

export const CouplingMappingSchema = z.object({
  stockCode: z.string(),
  stockName: z.string(),
  usSymbols: z.array(z.string()),
  usIndices: z.array(z.string()),
  sector: CouplingSectorSchema,
  strength: CouplingStrengthSchema,
  description: z.string(),
});

const SectorDefaultSchema = z.object({
  usSymbols: z.array(z.string()),
  usIndices: z.array(z.string()),
  strength: CouplingStrengthSchema,
});
export type SectorDefault = z.infer<typeof SectorDefaultSchema>;

export const CouplingMapSchema = z.object({
  version: z.string(),
  mappings: z.array(CouplingMappingSchema),
  sectorDefaults: z.object({
    semiconductor: SectorDefaultSchema,
    ev_battery: SectorDefaultSchema,
    tech: SectorDefaultSchema,
    energy: SectorDefaultSchema,
    financial: SectorDefaultSchema,
    default: SectorDefaultSchema,
  }),
});
export type CouplingMapData = z.infer<typeof CouplingMapSchema>;

export const BreadthBasketSchema = z.object({
  version: z.string(),
  symbols: z.array(z.string()).min(1),
});

export const DATA_FILES = {
  fomcDates: 'fomc-dates.json',
  indexRebalance: 'index-rebalance.json',
  sectorEvents: 'sector-events.json',
  couplingMap: 'coupling-map.json',
  breadthBasket: 'breadth-basket.json',
} as const;

export function loadDataFile<S extends z.ZodTypeAny>(
  fileName: string,
  schema: S,
  dir: string = env.CALENDAR_DATA_DIR,
): z.infer<S> {
  const filePath = join(dir, fileName);

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new Error(`캘린더 데이터 읽기 실패 (${fileName}): ${toErrorMessage(error)}`);
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown';
    throw new Error(`캘린더 데이터 형식 오류 (${fileName}) ${where}`);
  }
  return parsed.data;
}

export function loadFomcDates(dir?: string): FomcDates {
  return loadDataFile(DATA_FILES.fomcDates, FomcDatesSchema, dir);
}

export function loadIndexRebalance(dir?: string): IndexRebalanceData {
  return loadDataFile(DATA_FILES.indexRebalance, IndexRebalanceSchema, dir);
}

export function loadSectorEvents(dir?: string): SectorEventTemplate[] {
  return loadDataFile(DATA_FILES.sectorEvents, SectorEventsSchema, dir).events;
}

export function loadCouplingMap(dir?: string): CouplingMapData {
  return loadDataFile(DATA_FILES.couplingMap, CouplingMapSchema, dir);
}

export function loadBreadthBasket(dir?: string): string[] {
  return loadDataFile(DATA_FILES.breadthBasket, BreadthBasketSchema, dir).symbols;
}
