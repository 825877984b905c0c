export type { ProjectConfig } from './project-config.ts';
export {
  CONFIG_FILENAME,
  loadProjectConfig,
  validateConfig,
  writeProjectConfig,
} from './project-config.ts';
