/**
 * Shared Drizzle ORM mock for unit tests.
 *
 * Every query-builder method returns the mock itself. Control results by
 * overriding whichever method ends the chain under test:
 *
 *   mockDb.returning.mockResolvedValueOnce([row]);   // insert/delete
 *   mockDb.limit.mockResolvedValueOnce([row]);       // select ... limit
 */
export function createDrizzleMock() {
  const mock: Record<string, jest.Mock> = {};

  const chainMethods = [
    // Select chain
    'select',
    'from',
    'where',
    'orderBy',
    'limit',
    // Insert chain
    'insert',
    'values',
    'onConflictDoUpdate',
    'returning',
    // Delete
    'delete',
    // Raw SQL
    'execute',
  ];

  for (const m of chainMethods) {
    mock[m] = jest.fn().mockReturnThis();
  }

  return mock;
}

export type MockDb = ReturnType<typeof createDrizzleMock>;
