/**
 * Golden fixture testing for rendered decks.
 */

export {
  GoldenTestRunner,
  GoldenCatalogSchema,
  loadGoldenCatalog,
  describeByteDiff,
  runGoldenTests,
  recordGoldenFixtures,
  formatGoldenReport,
  type GoldenCatalog,
  type GoldenCase,
  type GoldenStatus,
  type GoldenStageResult,
  type GoldenCaseResult,
  type GoldenReport,
  type GoldenTestOptions,
  type GoldenRecordResult,
} from './GoldenTestRunner.js';
