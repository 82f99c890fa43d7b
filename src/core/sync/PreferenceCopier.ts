// src/core/sync/PreferenceCopier.ts

import type { AccountSession, PreferenceCopyOutcome, PreferenceMap } from './types';
import type { Logger } from '../../observability/Logger';
import { toRemoteUnavailable } from '../../utils/errors';

/**
 * Blind copy of the source's preference map onto the destination in a single
 * write. Keys are not compared; every source value overwrites the destination's.
 */
export class PreferenceCopier {
  constructor(private logger: Logger) {}

  /**
   * @throws {RemoteUnavailableError} If reading or writing the preferences fails
   */
  async copy(
    source: AccountSession,
    destination: AccountSession,
    opts: { dryRun?: boolean } = {}
  ): Promise<PreferenceCopyOutcome> {
    let preferences: PreferenceMap;
    try {
      preferences = await source.getPreferences();
    } catch (error: unknown) {
      throw toRemoteUnavailable(error, { account: source.account, operation: 'getPreferences' });
    }

    const keyCount = Object.keys(preferences).length;

    if (opts.dryRun) {
      this.logger.info('Preferences read (dry run)', { source: source.account, keyCount });
      return { status: 'planned', keyCount };
    }

    try {
      await destination.setPreferences(preferences);
    } catch (error: unknown) {
      throw toRemoteUnavailable(error, { account: destination.account, operation: 'setPreferences' });
    }

    this.logger.info('Preferences copied', {
      source: source.account,
      destination: destination.account,
      keyCount,
    });
    return { status: 'copied', keyCount };
  }
}
