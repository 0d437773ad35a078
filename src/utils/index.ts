/**
 * Utilities Module
 */

export { formatTable, truncate, type Column, type Alignment, type Row } from './table.js';

export { consoleLogger, silentLogger, scopedLogger, type Logger } from './logger.js';
