import { promises as fs } from 'fs';
import path from 'path';
import type { SourceName } from '../../types/therapy';
import { SourceUnavailableError } from './errors';

/** Retrieves a fresh source file into `targetDir` and returns its path. */
export type SourceFetcher = (sourceName: SourceName, targetDir: string) => Promise<string | null>;

export type VersionedFile = {
  path: string;
  version: string;
};

export type ResolveSourceFileOptions = {
  sourceName: SourceName;
  dataDir: string;
  filePrefix: string;
  extension: string;
  fetcher?: SourceFetcher;
};

const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/** Returns `<version>` for a `<prefix>_<version>.<extension>` file name. */
export function parseVersionedFileName(
  fileName: string,
  filePrefix: string,
  extension: string,
): string | null {
  const pattern = new RegExp(`^${escapeRegExp(filePrefix)}_(.+)\\.${escapeRegExp(extension)}$`);
  const match = pattern.exec(fileName);
  return match ? match[1] : null;
}

async function listDirectory(directory: string): Promise<string[]> {
  try {
    return await fs.readdir(directory);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }
}

/** Newest file by lexicographic name order, like a sorted directory listing. */
export async function findNewestVersionedFile(
  directory: string,
  filePrefix: string,
  extension: string,
): Promise<VersionedFile | null> {
  const candidates = (await listDirectory(directory))
    .filter((fileName) => parseVersionedFileName(fileName, filePrefix, extension) !== null)
    .sort();

  const newest = candidates[candidates.length - 1];
  if (newest === undefined) {
    return null;
  }

  const version = parseVersionedFileName(newest, filePrefix, extension);
  return version === null ? null : { path: path.join(directory, newest), version };
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Finds `<dataDir>/<prefix>/<prefix>_<version>.<extension>`, falling back to
 * the fetcher when the directory holds no such file.
 */
export async function resolveSourceFile(options: ResolveSourceFileOptions): Promise<VersionedFile> {
  const { sourceName, dataDir, filePrefix, extension, fetcher } = options;
  const directory = path.join(dataDir, filePrefix);

  const existing = await findNewestVersionedFile(directory, filePrefix, extension);
  if (existing) {
    return existing;
  }

  if (fetcher) {
    const fetchedPath = await fetcher(sourceName, directory);
    if (fetchedPath) {
      const version = parseVersionedFileName(path.basename(fetchedPath), filePrefix, extension);
      if (version === null) {
        throw new SourceUnavailableError(
          sourceName,
          `Fetched file ${fetchedPath} does not match ${filePrefix}_<version>.${extension}`,
        );
      }
      return { path: fetchedPath, version };
    }
  }

  throw new SourceUnavailableError(
    sourceName,
    `No ${filePrefix}_<version>.${extension} file in ${directory}`,
  );
}
