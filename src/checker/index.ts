export { Checker, type CheckerOptions } from './checker.js';
