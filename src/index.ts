export type {
  Cell,
  ColumnSchema,
  NormalizedPolls,
  ParsedDate,
  PollRecord,
  PollTable,
  RunSummary,
  WeightedAccumulator,
} from '../types/index.js';
export { extractDate, extractPollster, extractSponsor } from './lib/extractors.js';
export { rewriteSchema, DROPPED_COLUMNS } from './lib/schema.js';
export { enrichRecord, enrichRecords, sortByDateDesc } from './lib/pipeline.js';
export { parseDateOrMin, parseIsoDate, MIN_DATE } from './lib/dates.js';
export {
  applyRollingWeightedAverage,
  formatWeightedApprove,
  globalWeightedAverage,
  parseNumber,
} from './lib/aggregate.js';
export { formatPollCsv, parsePollCsv, readPollCsv, writePollCsv } from './lib/csvFile.js';
export { normalizePolls } from './lib/normalize.js';
export { runCli, USAGE, type CliIO } from './lib/runCli.js';
