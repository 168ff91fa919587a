export * from './types/index.js';
export * from './constants/index.js';
export * from './schemas/index.js';
export * from './utils/assignment.js';
export * from './utils/week.js';
