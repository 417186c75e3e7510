export {
  getLockedAccountPolicy,
  getLogFilePath,
  getLogLevel,
  getNodeEnv,
  LOCKED_ACCOUNT_POLICIES,
  type LockedAccountPolicy,
  resetEnvCache,
} from './config.js';
