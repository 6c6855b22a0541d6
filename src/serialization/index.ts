export type { LoadOptions, SessionConfig } from './loader.js';
export {
  loadConfigFromFile,
  loadConfigFromObject,
  loadConfigFromText,
  parseExternalCurve,
  saveConfigToFile,
} from './loader.js';
export type { ExternalCurveRaw, SessionConfigRaw } from './schema.js';
export { externalCurveSchema, sessionConfigSchema } from './schema.js';
