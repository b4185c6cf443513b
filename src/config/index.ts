export type {
  SessionsConfig,
  ManagerSettings,
  PersistenceSettings,
  CustomTemplateConfig,
} from './types.js';

export { loadConfig, validateConfig, getDefaultConfig, CONFIG_NAMES } from './loader.js';
export type { ValidationResult } from './loader.js';

export { buildTemplateRegistry, toManagerConfig, expandHome } from './options.js';

export {
  TemplateRegistry,
  DEFAULT_TEMPLATE,
  builtinTemplates,
  mergeConfig,
  validateOverrides,
  defaultTemplate,
  apiWorkflowTemplate,
  fileProcessingTemplate,
  batchOperationTemplate,
  developmentTemplate,
  testingTemplate,
  maintenanceTemplate,
} from './templates.js';
export type { SessionTemplate } from './templates.js';
