jest.mock('../../services/conceptXrefBackfill', () => ({
  backfillConceptXrefs: jest.fn(),
}));

import * as functions from 'firebase-functions';
import { backfillConceptXrefs } from '../../services/conceptXrefBackfill';
import { runConceptXrefBackfill } from '../conceptXrefBackfill';

const mockedBackfill = jest.mocked(backfillConceptXrefs);

describe('runConceptXrefBackfill', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('runs the backfill with the configured page bounds', async () => {
    mockedBackfill.mockResolvedValue({
      scanned: 0,
      updated: 0,
      skipped: 0,
      invalid: 0,
      pagesProcessed: 1,
      hasMore: false,
      nextCursor: null,
      dryRun: false,
      pageSize: 250,
    });

    await runConceptXrefBackfill();

    expect(mockedBackfill).toHaveBeenCalledWith({ pageSize: 250, maxPages: 20 });
    expect(functions.logger.info).toHaveBeenCalledTimes(1);
  });

  it('logs the cursor when items remain', async () => {
    mockedBackfill.mockResolvedValue({
      scanned: 250,
      updated: 3,
      skipped: 0,
      invalid: 0,
      pagesProcessed: 20,
      hasMore: true,
      nextCursor: 'doc-250',
      dryRun: false,
      pageSize: 250,
    });

    await runConceptXrefBackfill();

    expect(functions.logger.info).toHaveBeenLastCalledWith(
      '[ConceptXrefBackfill] More identity items remain for the next run',
      { nextCursor: 'doc-250' },
    );
  });

  it('propagates backfill failures', async () => {
    mockedBackfill.mockRejectedValue(new Error('scan failed'));

    await expect(runConceptXrefBackfill()).rejects.toThrow('scan failed');
  });
});
