import { describe, expect, it, vi } from 'vitest';
import { SessionRoles } from '../roles.js';

function source(groups: string[]) {
  return { activeUserGroups: vi.fn(async () => groups) };
}

describe('SessionRoles', () => {
  it('should treat the built-in Admin user as admin without a lookup', async () => {
    const groups = source([]);
    const roles = new SessionRoles(groups, ' Admin ');

    expect(await roles.isAdmin()).toBe(true);
    expect(await roles.isDataAdmin()).toBe(true);
    expect(groups.activeUserGroups).not.toHaveBeenCalled();
  });

  it('should resolve flags from group membership once', async () => {
    const groups = source(['Data Admin', 'Planners']);
    const roles = new SessionRoles(groups, 'planner');

    expect(await roles.isAdmin()).toBe(false);
    expect(await roles.isDataAdmin()).toBe(true);
    expect(await roles.isOpsAdmin()).toBe(false);
    expect(await roles.isSecurityAdmin()).toBe(false);
    expect(groups.activeUserGroups).toHaveBeenCalledTimes(1);
  });

  it('should look groups up again after a failure', async () => {
    const activeUserGroups = vi
      .fn<[], Promise<string[]>>()
      .mockRejectedValueOnce(new Error('offline'))
      .mockResolvedValueOnce(['OperationsAdmin']);
    const roles = new SessionRoles({ activeUserGroups }, 'ops');

    await expect(roles.isOpsAdmin()).rejects.toThrow('offline');
    expect(await roles.isOpsAdmin()).toBe(true);
  });
});
