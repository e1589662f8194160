export {
  type BrowserLauncher,
  createChromiumLauncher,
  type LaunchOptions,
  type SessionOptions,
  withBrowserSession,
} from './session.js';
export {
  extractPageTimings,
  type RawDocumentTimings,
  resolveDocumentTimings,
  resolveTtfb,
} from './timings.js';
