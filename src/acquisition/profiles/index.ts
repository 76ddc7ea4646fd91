export {
  S3_DEFAULT,
  S3_STRICT,
  DEFAULT_PROFILE_NAME,
  listProfiles,
  getProfile,
  withFences,
  validateProfile
} from './profiles';
export type * from './types';
