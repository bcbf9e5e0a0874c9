import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../dynamodb.js', () => ({
  getItem: vi.fn(),
}));

vi.mock('../config.js', () => ({
  config: {
    tables: { users: 'test-users-table' },
  },
}));

// Import after mocks are set up
import { isEligibleToRegister } from './users.js';
import { getItem } from '../dynamodb.js';

describe('isEligibleToRegister', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('allows an active user with registration rights', async () => {
    vi.mocked(getItem).mockResolvedValue({
      userId: 'user-1',
      isActive: true,
      canRegisterSerials: true,
    });

    await expect(isEligibleToRegister('user-1')).resolves.toBe(true);
    expect(getItem).toHaveBeenCalledWith({
      TableName: 'test-users-table',
      Key: { PK: 'USER#user-1', SK: 'META' },
      ProjectionExpression: 'userId, isActive, canRegisterSerials',
    });
  });

  it('rejects unknown, inactive and restricted users', async () => {
    vi.mocked(getItem)
      .mockResolvedValueOnce(null)
      .mockResolvedValueOnce({ userId: 'user-2', isActive: false, canRegisterSerials: true })
      .mockResolvedValueOnce({ userId: 'user-3', isActive: true });

    await expect(isEligibleToRegister('user-1')).resolves.toBe(false);
    await expect(isEligibleToRegister('user-2')).resolves.toBe(false);
    await expect(isEligibleToRegister('user-3')).resolves.toBe(false);
  });
});
