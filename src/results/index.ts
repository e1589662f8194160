export { ResultLogger } from './resultLogger.js';
