export * from './pack.js';
export * from './taxonomy.js';
