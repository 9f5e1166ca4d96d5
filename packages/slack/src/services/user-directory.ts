import type { WebClient } from '@slack/web-api';
import { logger } from '@threadsage/shared';

/**
 * Resolves a platform user id to a human-readable name.
 * `null` means the user is unknown; implementations may also throw.
 */
export interface UserDirectory {
  resolve(userId: string): Promise<string | null>;
}

interface SlackUserInfo {
  real_name?: string;
  name?: string;
  profile?: { display_name?: string; real_name?: string };
}

/**
 * Slack users.info lookup with a process-lifetime cache.
 * Prefers real name, then display name, then username.
 */
export class SlackUserDirectory implements UserDirectory {
  private cache = new Map<string, string | null>();

  constructor(private readonly client: WebClient) {}

  async resolve(userId: string): Promise<string | null> {
    if (!userId || userId === 'unknown') return null;

    const cached = this.cache.get(userId);
    if (cached !== undefined) return cached;

    try {
      const response = await this.client.users.info({ user: userId });
      const user: SlackUserInfo = response.user ?? {};
      const name =
        user.real_name?.trim() || user.profile?.display_name?.trim() || user.name?.trim() || null;
      this.cache.set(userId, name);
      return name;
    } catch (error) {
      logger.warn(`Failed to get user info for ${userId}`, {
        userId,
        error: error instanceof Error ? error.message : String(error),
      });
      // Cache the miss so one bad id doesn't cost an API call per message
      this.cache.set(userId, null);
      return null;
    }
  }
}
