import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { SourceUnavailableError } from '../errors';
import {
  findNewestVersionedFile,
  parseVersionedFileName,
  resolveSourceFile,
} from '../sourceFiles';

describe('sourceFiles', () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'therapy-sources-'));
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  async function writeSourceFile(directory: string, fileName: string): Promise<string> {
    const target = path.join(dataDir, directory);
    await fs.mkdir(target, { recursive: true });
    const filePath = path.join(target, fileName);
    await fs.writeFile(filePath, '');
    return filePath;
  }

  it('parses the version out of a versioned file name', () => {
    expect(parseVersionedFileName('chembl_33.db', 'chembl', 'db')).toBe('33');
    expect(parseVersionedFileName('drugbank_5.1.10.xml', 'drugbank', 'xml')).toBe('5.1.10');
    expect(parseVersionedFileName('rxnorm_drug_forms_20240101.json', 'rxnorm', 'RRF')).toBeNull();
    expect(parseVersionedFileName('chembl_33.db.gz', 'chembl', 'db')).toBeNull();
  });

  it('picks the last file in name order', async () => {
    await writeSourceFile('chembl', 'chembl_32.db');
    await writeSourceFile('chembl', 'chembl_33.db');
    await writeSourceFile('chembl', 'notes.txt');

    const newest = await findNewestVersionedFile(path.join(dataDir, 'chembl'), 'chembl', 'db');

    expect(newest).toEqual({ path: path.join(dataDir, 'chembl', 'chembl_33.db'), version: '33' });
  });

  it('treats a missing directory as empty', async () => {
    await expect(
      findNewestVersionedFile(path.join(dataDir, 'missing'), 'chembl', 'db'),
    ).resolves.toBeNull();
  });

  it('asks the fetcher when no local file exists', async () => {
    const fetcher = jest.fn(async (_source: string, targetDir: string) =>
      writeSourceFile(path.relative(dataDir, targetDir), 'wikidata_20240101.json'),
    );

    const file = await resolveSourceFile({
      sourceName: 'Wikidata',
      dataDir,
      filePrefix: 'wikidata',
      extension: 'json',
      fetcher,
    });

    expect(fetcher).toHaveBeenCalledWith('Wikidata', path.join(dataDir, 'wikidata'));
    expect(file).toEqual({
      path: path.join(dataDir, 'wikidata', 'wikidata_20240101.json'),
      version: '20240101',
    });
  });

  it('does not fetch when a local file exists', async () => {
    await writeSourceFile('wikidata', 'wikidata_20230101.json');
    const fetcher = jest.fn(async () => null);

    const file = await resolveSourceFile({
      sourceName: 'Wikidata',
      dataDir,
      filePrefix: 'wikidata',
      extension: 'json',
      fetcher,
    });

    expect(file.version).toBe('20230101');
    expect(fetcher).not.toHaveBeenCalled();
  });

  it('throws SourceUnavailableError with neither a file nor a fetched one', async () => {
    const resolving = resolveSourceFile({
      sourceName: 'DrugBank',
      dataDir,
      filePrefix: 'drugbank',
      extension: 'xml',
      fetcher: async () => null,
    });

    await expect(resolving).rejects.toBeInstanceOf(SourceUnavailableError);
    await expect(resolving).rejects.toThrow(
      `No drugbank_<version>.xml file in ${path.join(dataDir, 'drugbank')}`,
    );
  });
});
