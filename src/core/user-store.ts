/**
 * User store
 *
 * Users are keyed by the identity the front end supplies and created on first
 * contact. Every turn refreshes lastActiveAt; users are never deleted here.
 */

import type { StorageProvider } from '../storage/storage-provider.js';
import type { User } from '../types/user.js';
import { createChildLogger } from './logger.js';

const log = createChildLogger('UserStore');

export class UserStore {
  constructor(
    private readonly storage: StorageProvider,
    private readonly now: () => number = Date.now,
  ) {}

  /**
   * Get or create the user and mark them active.
   *
   * Called once per turn, before context assembly.
   */
  async touch(userId: string): Promise<User> {
    const user = await this.storage.touchUser(userId, this.now());
    if (user.createdAt === user.lastActiveAt) {
      log.info({ userId }, 'new user');
    }
    return user;
  }

  async get(userId: string): Promise<User | null> {
    return this.storage.getUser(userId);
  }

  /** Set (or replace) the display name */
  async setDisplayName(userId: string, displayName: string): Promise<void> {
    const name = displayName.trim();
    if (!name) return;

    const existing = await this.storage.getUser(userId);
    if (existing?.displayName === name) return;

    await this.storage.setDisplayName(userId, name);
    log.info({ userId, displayName: name }, 'display name updated');
  }
}
