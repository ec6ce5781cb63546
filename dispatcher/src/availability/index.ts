import type { AvailabilityConfiguration } from '@gantry/shared';
import type { Logger } from '@gantry/shared';
import { GitLabAvailabilityProber } from './gitlab.js';
import { NullAvailabilityProber, type AvailabilityProber, type ProfileSource } from './prober.js';

export {
  NullAvailabilityProber,
  type AvailabilityProber,
  type ProfileSource,
} from './prober.js';

export { GitLabAvailabilityProber, type GitLabProberConfig } from './gitlab.js';

/**
 * Build the prober named by the configuration
 */
export function createAvailabilityProber(
  config: AvailabilityConfiguration,
  fleet: ProfileSource,
  logger?: Logger,
): AvailabilityProber {
  switch (config.provider) {
    case 'gitlab':
      return new GitLabAvailabilityProber(fleet, {
        gitlabUrl: config.gitlabUrl,
        token: config.token,
        timeoutMs: config.timeoutMs,
        logger,
      });
    case 'none':
      return new NullAvailabilityProber();
  }
}
