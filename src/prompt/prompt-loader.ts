import { readFile } from 'node:fs/promises';
import { StateIOError } from '../errors.js';
import { DEFAULT_PROMPT_FILE } from '../utils/package-paths.js';
import { MigrationPrompt, parsePrompt } from './prompt-parser.js';

/**
 * Read and parse a prompt document.
 *
 * @param promptFile - Prompt document path (defaults to the bundled migration prompt)
 * @throws {StateIOError} If the file cannot be read
 * @throws {NoStepsFoundError} If the document has no steps
 */
export async function loadPrompt(
  promptFile: string = DEFAULT_PROMPT_FILE
): Promise<MigrationPrompt> {
  let text: string;
  try {
    text = await readFile(promptFile, 'utf8');
  } catch (error) {
    throw new StateIOError('reading prompt', promptFile, error);
  }
  return parsePrompt(text);
}
