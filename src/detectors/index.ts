export type { ISignalDetector } from './ISignalDetector.js';
export { PatternDetector } from './PatternDetector.js';
export { ModelDetector, FRAUD_LABELS } from './ModelDetector.js';
export { SentimentDetector } from './SentimentDetector.js';
export { StatisticalDetector } from './StatisticalDetector.js';
