export type { IEmbeddingProvider } from './IEmbeddingProvider.js';
export { OpenAIEmbeddingProvider } from './OpenAIEmbeddingProvider.js';
export type { IGenerationProvider, GenerationOptions } from './IGenerationProvider.js';
export { OpenAIGenerationProvider } from './OpenAIGenerationProvider.js';
export type { ITextClassifier, Classification } from './ITextClassifier.js';
export { OpenAITextClassifier } from './OpenAITextClassifier.js';
export type { ILogProvider, LogEvent, LogLevel, RequestLogEvent } from './ILogProvider.js';
export { ConsoleLogProvider } from './ConsoleLogProvider.js';
export { AxiomLogProvider } from './AxiomLogProvider.js';
export { ScopedLogProvider } from './ScopedLogProvider.js';
