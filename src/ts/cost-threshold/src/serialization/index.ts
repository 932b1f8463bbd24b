export type { FileFormat, LoadOptions, SweepConfig } from './loader.js';
export {
  loadSweepConfigFromFile,
  loadSweepConfigFromObject,
  loadSweepConfigFromText,
  saveSweepConfigToFile,
  saveSweepReportToFile,
  sweepFromConfig,
  sweepReportToObject,
} from './loader.js';
export type { ScenarioRaw, SweepConfigRaw } from './schema.js';
export { scenarioSchema, sweepConfigSchema } from './schema.js';
