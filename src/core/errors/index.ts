export { FusionError, ErrorCode, isFusionError, wrapError } from './FusionError';
