/**
 * Jest Test Setup
 * Mocks for Firebase Admin SDK and the functions logger
 */

// Mock firebase-admin before any imports
jest.mock('firebase-admin', () => {
  const createFirestoreMock = (): Record<string, unknown> => {
    const mock: Record<string, unknown> = {
      collection: jest.fn(() => mock),
      doc: jest.fn(() => mock),
      get: jest.fn(() => Promise.resolve({ exists: false, data: () => null })),
      set: jest.fn(() => Promise.resolve()),
      update: jest.fn(() => Promise.resolve()),
      delete: jest.fn(() => Promise.resolve()),
      where: jest.fn(() => mock),
      orderBy: jest.fn(() => mock),
      limit: jest.fn(() => mock),
    };
    return mock;
  };
  const firestoreMock = createFirestoreMock();
  const deleteSentinel = { fieldValue: 'delete' };

  return {
    initializeApp: jest.fn(),
    apps: [],
    firestore: Object.assign(
      jest.fn(() => firestoreMock),
      {
        FieldValue: {
          delete: jest.fn(() => deleteSentinel),
        },
        FieldPath: {
          documentId: jest.fn(() => '__name__'),
        },
        Timestamp: {
          now: jest.fn(() => ({
            toDate: () => new Date(),
            toMillis: () => Date.now(),
          })),
        },
      },
    ),
  };
});

// Mock firebase-functions logger
jest.mock('firebase-functions', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

jest.mock('firebase-functions/v2/scheduler', () => ({
  onSchedule: jest.fn((_options: unknown, handler: unknown) => handler),
}));

process.env.NODE_ENV = 'test';

// Increase timeout for async operations
jest.setTimeout(10000);
