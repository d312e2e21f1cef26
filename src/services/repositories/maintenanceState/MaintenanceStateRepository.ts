import type { z } from 'zod';

export type MaintenanceStateSetOptions = {
  merge?: boolean;
};

export interface MaintenanceStateRepository {
  /**
   * Reads a job's state document through `schema`. Missing documents and
   * documents that no longer match the schema both read as null.
   */
  readState<TState>(
    documentId: string,
    schema: z.ZodType<TState, z.ZodTypeDef, unknown>,
  ): Promise<TState | null>;
  setState(
    documentId: string,
    data: FirebaseFirestore.DocumentData,
    options?: MaintenanceStateSetOptions,
  ): Promise<void>;
}
