export { extractAssignment } from './extractor';
export { getAssignmentPattern, getPatternCacheSize, escapeKey } from './helpers';
