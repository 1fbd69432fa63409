export * from './intent-classifier.js';
export * from './naive-bayes.js';
export * from './patterns.js';
export * from './training-data.js';
