import { readFile } from 'fs/promises';
import { InputReadError } from '../evaluation/errors';

export async function readJsonFile(path: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new InputReadError(path, error instanceof Error ? error : new Error(String(error)));
  }
  try {
    return JSON.parse(content);
  } catch (error) {
    throw new InputReadError(path, error instanceof Error ? error : new Error(String(error)));
  }
}
