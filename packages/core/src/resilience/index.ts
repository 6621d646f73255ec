export { resilientCall, createPolicy, type CallPolicy, type PolicyDefaults } from './callWrapper.js';
export {
  isNetworkError,
  isRetryable,
  errorChain,
  type CallErrorKind,
  type CallErrorClass,
  type ErrorClassifier,
} from './classify.js';
export { SessionCell, type SessionSnapshot } from './sessionCell.js';
