/**
 * Rubric Loading
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { getConfig } from '../config';
import { ProfilerErrorFactory } from '../errors/types';
import { rubricValidator } from '../validation/validator';
import type { Rubric } from '../validation/validator';

/**
 * Validate a rubric configuration
 * @throws ProfilerError with code INVALID_RUBRIC
 */
export function parseRubric(raw: unknown): Rubric {
  return rubricValidator.validateAndParse(raw);
}

/**
 * Read and validate a JSON rubric file
 * @throws ProfilerError with code INVALID_RUBRIC when the file is unreadable or invalid
 */
export async function loadRubricFile(filePath: string): Promise<Rubric> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw ProfilerErrorFactory.invalidRubric([{ field: 'rubric', message: `Could not read ${filePath}: ${reason}` }]);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw ProfilerErrorFactory.invalidRubric([{ field: 'rubric', message: `Invalid JSON in ${filePath}: ${reason}` }]);
  }

  return parseRubric(raw);
}

/**
 * Load the rubric named by the processing configuration, relative to the working directory
 */
export function loadDefaultRubric(): Promise<Rubric> {
  return loadRubricFile(path.resolve(getConfig().getProcessingConfig().rubricPath));
}
