/**
 * Leg pipeline type definitions
 */

import type { FirmwareProfile } from '@acquisition/profiles';
import type { EndpointFetcher } from '@transport/http-fetcher';

/**
 * Everything one leg needs; legs share no mutable state
 */
export interface LegContext {
  fetcher: EndpointFetcher;
  profile: FirmwareProfile;
  /** Replace implausible samples and apply report fences */
  sanitize: boolean;
}
