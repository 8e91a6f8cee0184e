import { readFileSync, statSync } from 'fs';
import logger from '../utils/logger';
import { MAPBOX_TOKEN_PATH } from './profile';

/**
 * Missing files are the expected case on devices without navigation set up.
 */
const ABSENT_CODES = new Set(['ENOENT', 'ENOTDIR']);

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Shell command substitution semantics: NUL bytes are dropped and trailing
 * newlines are stripped. Other whitespace is kept.
 */
export function normalizeTokenContent(content: string): string {
  return content.replace(/\0/g, '').replace(/\n+$/, '');
}

/**
 * Read the navigation token from its device-local file.
 *
 * Returns undefined when the path is absent, is not a regular file, cannot be
 * read, or holds nothing but newlines and NUL bytes.
 */
export function readToken(path: string = MAPBOX_TOKEN_PATH): string | undefined {
  let isFile: boolean;
  try {
    isFile = statSync(path).isFile();
  } catch (error) {
    const code = errorCode(error);
    if (code === undefined || !ABSENT_CODES.has(code)) {
      logger.warn({ path, code }, 'Token file could not be inspected, skipping');
    }
    return undefined;
  }

  if (!isFile) {
    logger.debug({ path }, 'Token path is not a regular file, skipping');
    return undefined;
  }

  let content: string;
  try {
    content = normalizeTokenContent(readFileSync(path, 'utf8'));
  } catch (error) {
    logger.warn({ path, code: errorCode(error) }, 'Token file could not be read, skipping');
    return undefined;
  }

  if (content === '') {
    logger.debug({ path }, 'Token file is empty, skipping');
    return undefined;
  }

  return content;
}
