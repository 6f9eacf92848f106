export { HypothesisError, ErrorCode, isHypothesisError, wrapError } from './HypothesisError';
