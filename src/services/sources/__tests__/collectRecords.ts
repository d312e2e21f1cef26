import type { ConceptRecord } from '../../../types/therapy';
import type { MalformedRecordError } from '../errors';
import type { TransformContext } from '../sourceAdapter';

export function buildTransformContext() {
  const malformed: MalformedRecordError[] = [];
  const context: TransformContext = {
    reportMalformed: (error) => {
      malformed.push(error);
    },
  };
  return { context, malformed };
}

export async function collectRecords(records: AsyncIterable<ConceptRecord>): Promise<ConceptRecord[]> {
  const collected: ConceptRecord[] = [];
  for await (const record of records) {
    collected.push(record);
  }
  return collected;
}
