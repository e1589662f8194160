export { errorMessage, formatError, truncate } from './format.js';
