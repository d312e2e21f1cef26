import * as functions from 'firebase-functions';
import type { z } from 'zod';
import type {
  MaintenanceStateRepository,
  MaintenanceStateSetOptions,
} from './MaintenanceStateRepository';

export const MAINTENANCE_STATE_COLLECTION = 'systemMaintenance';

export class FirestoreMaintenanceStateRepository implements MaintenanceStateRepository {
  constructor(
    private readonly db: FirebaseFirestore.Firestore,
    private readonly collectionName: string = MAINTENANCE_STATE_COLLECTION,
  ) {}

  private stateDoc(documentId: string) {
    return this.db.collection(this.collectionName).doc(documentId);
  }

  async readState<TState>(
    documentId: string,
    schema: z.ZodType<TState, z.ZodTypeDef, unknown>,
  ): Promise<TState | null> {
    const snapshot = await this.stateDoc(documentId).get();
    if (!snapshot.exists) {
      return null;
    }

    const parsed = schema.safeParse(snapshot.data());
    if (!parsed.success) {
      functions.logger.warn('[MaintenanceState] Ignoring state document with unexpected shape', {
        documentId,
        issues: parsed.error.issues.map((issue) => issue.message),
      });
      return null;
    }
    return parsed.data;
  }

  async setState(
    documentId: string,
    data: FirebaseFirestore.DocumentData,
    options: MaintenanceStateSetOptions = {},
  ): Promise<void> {
    await this.stateDoc(documentId).set(data, { merge: options.merge !== false });
  }
}
