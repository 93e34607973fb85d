export type { ILogProvider, LogEvent, LogLevel, RequestLogEvent } from './ILogProvider.js';
export { ConsoleLogProvider } from './ConsoleLogProvider.js';
export { CloudWatchLogProvider } from './CloudWatchLogProvider.js';
export type { IMetricsProvider, MetricDatum, MetricUnit } from './IMetricsProvider.js';
export { CloudWatchMetricsProvider } from './CloudWatchMetricsProvider.js';
export { InMemoryMetricsProvider } from './InMemoryMetricsProvider.js';
export type { ITranslationProvider } from './ITranslationProvider.js';
export { AwsTranslateProvider } from './AwsTranslateProvider.js';
export type { ISpeechProvider, SynthesizedAudio } from './ISpeechProvider.js';
export { PollySpeechProvider } from './PollySpeechProvider.js';
export type { IObjectStorage } from './IObjectStorage.js';
export { SupabaseObjectStorage } from './SupabaseObjectStorage.js';
export { InMemoryObjectStorage } from './InMemoryObjectStorage.js';
export type { IImageProcessor } from './IImageProcessor.js';
export { SharpImageProcessor } from './SharpImageProcessor.js';
