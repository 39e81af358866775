export * from './health-scoring.js';
