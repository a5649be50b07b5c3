import { promises as fs } from 'fs';
import * as yaml from 'js-yaml';

import { DetailedValidationError } from '../errors';
import { Schemas, SchemaValidationCache } from '../schemas';
import { validateDetailed } from '../validation';

function isTaskDocument(data: unknown): data is object[] {
  const validateSchema = SchemaValidationCache.getValidatorFromSchema(Schemas.TaskDocument);
  return validateSchema(data);
}

/**
 * Parses a JSON or YAML list of task descriptions.
 *
 * Items are only checked to be objects; the factory validates each one.
 *
 * @throws DetailedValidationError if the content does not parse or is not a list of objects
 */
export function parseTaskDocument(content: string): object[] {
  let data: unknown;
  try {
    data = yaml.load(content);
  } catch (error) {
    throw new DetailedValidationError('TaskDocument', [{
      field: 'root',
      message: error instanceof Error ? error.message : String(error),
      value: undefined
    }]);
  }

  if (!isTaskDocument(data)) {
    const { errors } = validateDetailed(Schemas.TaskDocument, data);
    throw new DetailedValidationError('TaskDocument', errors);
  }

  return data;
}

/**
 * Reads and parses a task document from disk.
 */
export async function loadTaskDocument(filePath: string): Promise<object[]> {
  const content = await fs.readFile(filePath, 'utf-8');
  return parseTaskDocument(content);
}
