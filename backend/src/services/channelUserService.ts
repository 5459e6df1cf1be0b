import { ChannelAccount, ChannelUser } from '../types';
import { ChannelUserRepository } from '../db/repositories';
import { AdapterProvider } from '../adapters/AdapterFactory';

export interface UserHint {
  /** Display name that arrived with the event itself */
  profileName?: string;
}

/**
 * Resolves remote end-users to ChannelUser rows. The row is created before any
 * profile lookup so message handling never waits on enrichment.
 */
export class ChannelUserService {
  constructor(
    private readonly users: ChannelUserRepository,
    private readonly adapters: AdapterProvider
  ) {}

  async getOrCreateUser(account: ChannelAccount, platformUserId: string, hint: UserHint = {}): Promise<ChannelUser> {
    const { user, created } = await this.users.findOrCreate(account.id, platformUserId);
    const profileName = hint.profileName?.trim() ?? '';

    if (profileName) {
      if (user.name === profileName) {
        return user;
      }
      const updated = await this.users.updateProfile(user.id, {
        username: user.username,
        name: profileName,
        profilePictureUrl: user.profilePictureUrl,
      });
      return updated ?? user;
    }

    if (!created) {
      return user;
    }

    return this.enrich(account, user);
  }

  /**
   * Best-effort profile fetch for a freshly created user. Failures are logged and
   * the bare record is returned.
   */
  private async enrich(account: ChannelAccount, user: ChannelUser): Promise<ChannelUser> {
    try {
      const profile = await this.adapters.getAdapter(account.channel).getUserProfile(account, user.platformUserId);
      if (!profile) {
        return user;
      }

      const updated = await this.users.updateProfile(user.id, {
        username: profile.username,
        name: profile.name,
        profilePictureUrl: profile.profilePictureUrl,
      });
      return updated ?? user;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[users] Profile enrichment failed for ${account.channel} user ${user.platformUserId}: ${message}`);
      return user;
    }
  }
}
