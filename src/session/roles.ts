/**
 * Lazily resolved admin flags of the session user.
 * @module session/roles
 */

import { lowerAndDropSpaces } from '../utils/index.js';

/**
 * Source of the active user's group names.
 */
export interface GroupSource {
  activeUserGroups(): Promise<string[]>;
}

const ADMIN = lowerAndDropSpaces('ADMIN');
const DATA_ADMIN = lowerAndDropSpaces('DataAdmin');
const SECURITY_ADMIN = lowerAndDropSpaces('SecurityAdmin');
const OPERATIONS_ADMIN = lowerAndDropSpaces('OperationsAdmin');

/**
 * Admin flags, resolved from group membership on first use and cached for
 * the lifetime of the session.
 */
export class SessionRoles {
  private groupsPromise: Promise<Set<string>> | null = null;

  /**
   * @param source - Group lookup, usually the security service
   * @param user - Configured user name; the built-in `Admin` user needs no lookup
   */
  constructor(
    private readonly source: GroupSource,
    private readonly user?: string
  ) {}

  async isAdmin(): Promise<boolean> {
    if (this.user !== undefined && lowerAndDropSpaces(this.user) === 'admin') {
      return true;
    }
    return (await this.groups()).has(ADMIN);
  }

  async isDataAdmin(): Promise<boolean> {
    return this.hasAnyOf(DATA_ADMIN);
  }

  async isSecurityAdmin(): Promise<boolean> {
    return this.hasAnyOf(SECURITY_ADMIN);
  }

  async isOpsAdmin(): Promise<boolean> {
    return this.hasAnyOf(OPERATIONS_ADMIN);
  }

  /**
   * Forgets cached membership, e.g. after switching user.
   */
  invalidate(): void {
    this.groupsPromise = null;
  }

  private async hasAnyOf(group: string): Promise<boolean> {
    if (await this.isAdmin()) {
      return true;
    }
    return (await this.groups()).has(group);
  }

  private groups(): Promise<Set<string>> {
    if (!this.groupsPromise) {
      this.groupsPromise = this.source.activeUserGroups().then(
        (names) => new Set(names.map(lowerAndDropSpaces)),
        (error: unknown) => {
          // Allow a later call to retry the lookup
          this.groupsPromise = null;
          throw error;
        }
      );
    }
    return this.groupsPromise;
  }
}
