import fs from 'node:fs';
import { link, rename, rm, unlink, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { PersistenceError } from '../errors.js';
import logger from '../logger.js';

export const STAGING_PREFIX = 'transferring.';

export type PersistResult = { ok: true; path: string } | { ok: false; error: PersistenceError };

export function stagingPath(directory: string, name: string): string {
  return path.join(directory, `${STAGING_PREFIX}${name}`);
}

/** Best-effort delete; a leftover staging file is reported, never thrown. */
export function removeStaged(filePath: string): boolean {
  try {
    fs.rmSync(filePath, { force: true });
    return true;
  } catch (error) {
    logger.warn({ err: error, path: filePath }, 'Failed to remove staging file');
    return false;
  }
}

export type PublishOptions = {
  /** Replace a file already published under the final name. */
  replace?: boolean;
};

/**
 * Moves a staged file to its final name. Without `replace` an existing file
 * is a collision: the staged file is deleted and `RenameFailed` reported.
 */
export function publishStaged(
  tempPath: string,
  finalPath: string,
  options: PublishOptions = {}
): PersistResult {
  try {
    if (options.replace) {
      fs.renameSync(tempPath, finalPath);
    } else {
      fs.linkSync(tempPath, finalPath);
      fs.unlinkSync(tempPath);
    }
    return { ok: true, path: finalPath };
  } catch (error) {
    removeStaged(tempPath);
    return {
      ok: false,
      error: new PersistenceError('RenameFailed', `Failed to publish ${path.basename(finalPath)}`, {
        cause: error,
        path: finalPath
      })
    };
  }
}

/**
 * Writes `contents` to `transferring.<name>` inside `directory` and renames it
 * to `<name>`, so readers never observe a partially written file.
 */
export function writeAtomically(
  directory: string,
  name: string,
  contents: Buffer | string,
  options: PublishOptions = {}
): PersistResult {
  const tempPath = stagingPath(directory, name);
  const finalPath = path.join(directory, name);

  try {
    fs.writeFileSync(tempPath, contents);
  } catch (error) {
    removeStaged(tempPath);
    return {
      ok: false,
      error: new PersistenceError('WriteFailed', `Failed to write ${path.basename(tempPath)}`, {
        cause: error,
        path: tempPath
      })
    };
  }

  return publishStaged(tempPath, finalPath, options);
}

/** `writeAtomically` for callers that must not block the event loop. */
export async function writeAtomicallyAsync(
  directory: string,
  name: string,
  contents: Buffer | string,
  options: PublishOptions = {}
): Promise<PersistResult> {
  const tempPath = stagingPath(directory, name);
  const finalPath = path.join(directory, name);

  try {
    await writeFile(tempPath, contents);
  } catch (error) {
    await rm(tempPath, { force: true }).catch(cleanupError => {
      logger.warn({ err: cleanupError, path: tempPath }, 'Failed to remove staging file');
    });
    return {
      ok: false,
      error: new PersistenceError('WriteFailed', `Failed to write ${path.basename(tempPath)}`, {
        cause: error,
        path: tempPath
      })
    };
  }

  try {
    if (options.replace) {
      await rename(tempPath, finalPath);
    } else {
      await link(tempPath, finalPath);
      await unlink(tempPath);
    }
    return { ok: true, path: finalPath };
  } catch (error) {
    await rm(tempPath, { force: true }).catch(cleanupError => {
      logger.warn({ err: cleanupError, path: tempPath }, 'Failed to remove staging file');
    });
    return {
      ok: false,
      error: new PersistenceError('RenameFailed', `Failed to publish ${path.basename(finalPath)}`, {
        cause: error,
        path: finalPath
      })
    };
  }
}
