import { promises as fs } from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';

import { DetailedValidationError } from '../../errors';
import { Schemas, SchemaValidationCache } from '../../schemas';
import { validateDetailed } from '../../validation';
import type { ConfigStore } from '../config_store';
import type { SchedulerConfigFile } from '../../config_manager/config_manager.types';

/**
 * Config file names looked up in the project directory, in order.
 */
export const CONFIG_FILE_NAMES = [
  'taskpool.config.yaml',
  'taskpool.config.yml',
  'taskpool.config.json',
] as const;

function isSchedulerConfigFile(data: unknown): data is SchedulerConfigFile {
  const validateSchema = SchemaValidationCache.getValidatorFromSchema(Schemas.SchedulerConfig);
  return validateSchema(data);
}

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * Filesystem-based ConfigStore. YAML and JSON files are both read with js-yaml.
 */
export class FsConfigStore implements ConfigStore {
  private readonly projectRootPath: string;

  constructor(projectRootPath: string) {
    this.projectRootPath = projectRootPath;
  }

  /**
   * @returns null when no config file exists
   * @throws DetailedValidationError if the first file found does not parse or
   * holds unknown or out-of-range settings
   */
  async loadConfig(): Promise<SchedulerConfigFile | null> {
    for (const fileName of CONFIG_FILE_NAMES) {
      const configPath = path.join(this.projectRootPath, fileName);

      let content: string;
      try {
        content = await fs.readFile(configPath, 'utf-8');
      } catch (error) {
        if (isMissingFile(error)) {
          continue;
        }
        throw error;
      }

      return this.parse(fileName, content);
    }

    return null;
  }

  private parse(fileName: string, content: string): SchedulerConfigFile {
    let data: unknown;
    try {
      data = yaml.load(content) ?? {};
    } catch (error) {
      throw new DetailedValidationError(fileName, [{
        field: 'root',
        message: error instanceof Error ? error.message : String(error),
        value: undefined
      }]);
    }

    if (!isSchedulerConfigFile(data)) {
      const { errors } = validateDetailed(Schemas.SchedulerConfig, data);
      throw new DetailedValidationError(fileName, errors);
    }

    return data;
  }
}
