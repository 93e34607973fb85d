/**
 * Production container. Wires real OpenAI, AWS and Supabase collaborators
 * where the environment configures them, in-memory ones otherwise.
 */

import { createContainer, type Container } from './container.js';
import { loadConfig, type Config } from './config.js';
import { getSupabaseClient } from './db.js';
import { DiseaseCatalog } from './catalog/DiseaseCatalog.js';
import type { AnalyzerStage } from './analyzers/IAnalyzer.js';
import { OpenAIVisionAnalyzer } from './analyzers/OpenAIVisionAnalyzer.js';
import { RekognitionLabelAnalyzer } from './analyzers/RekognitionLabelAnalyzer.js';
import { DemoAnalyzer } from './analyzers/DemoAnalyzer.js';
import { CircuitBreakerAnalyzer } from './analyzers/CircuitBreakerAnalyzer.js';
import { ReplyFormatter } from './services/ReplyFormatter.js';
import { SupabaseScanRepository } from './repositories/SupabaseScanRepository.js';
import { InMemoryScanRepository } from './repositories/InMemoryScanRepository.js';
import {
  AwsTranslateProvider,
  CloudWatchLogProvider,
  CloudWatchMetricsProvider,
  ConsoleLogProvider,
  InMemoryMetricsProvider,
  PollySpeechProvider,
  SharpImageProcessor,
  SupabaseObjectStorage,
  type ILogProvider,
} from './providers/index.js';

/** The demo stage does no I/O; this only bounds a misbehaving random source. */
const DEMO_TIMEOUT_MS = 1_000;

let cached: Container | null = null;

export function getProductionContainer(env: Record<string, string | undefined> = process.env): Container {
  if (cached) return cached;

  const config = loadConfig(env);
  const logProvider = createLogProvider(config);
  const catalog = DiseaseCatalog.load();
  const db =
    config.SUPABASE_URL && config.SUPABASE_SERVICE_ROLE_KEY
      ? getSupabaseClient(config.SUPABASE_URL, config.SUPABASE_SERVICE_ROLE_KEY)
      : null;

  if (!db) {
    logProvider.warn('Supabase not configured; scan history is kept in memory');
  }

  cached = createContainer({
    config,
    catalog,
    formatter: ReplyFormatter.load(),
    stages: buildStages(config, catalog, logProvider),
    imageProcessor: new SharpImageProcessor(),
    scanRepo: db ? new SupabaseScanRepository(db) : new InMemoryScanRepository(),
    logProvider,
    metrics: config.METRICS_NAMESPACE
      ? new CloudWatchMetricsProvider(
          { namespace: config.METRICS_NAMESPACE, region: config.AWS_REGION },
          logProvider
        )
      : new InMemoryMetricsProvider(),
    translator: config.TRANSLATE_ENABLED
      ? new AwsTranslateProvider({ region: config.AWS_REGION, sourceLanguage: config.DEFAULT_LANGUAGE })
      : undefined,
    speech: config.POLLY_ENABLED ? new PollySpeechProvider({ region: config.AWS_REGION }) : undefined,
    storage: db ? new SupabaseObjectStorage(db, config.STORAGE_BUCKET) : undefined,
    backends: {
      resultStore: db ? 'supabase' : 'memory',
      metrics: config.METRICS_NAMESPACE ? 'cloudwatch' : 'memory',
    },
  });

  logProvider.info('Container ready', {
    pipeline: cached.analysisService.stageEngines,
    catalogSize: catalog.size,
  });
  return cached;
}

// CloudWatch when a log group is configured, console otherwise.
function createLogProvider(config: Config): ILogProvider {
  return config.CLOUDWATCH_LOG_GROUP
    ? new CloudWatchLogProvider({
        logGroupName: config.CLOUDWATCH_LOG_GROUP,
        region: config.AWS_REGION,
      })
    : new ConsoleLogProvider({
        outputToConsole: true,
        minLevel: config.LOG_LEVEL,
        format: config.LOG_FORMAT,
      });
}

/** Ordered fallback chain: vision model, label detection, demo. Unconfigured stages are left out. */
export function buildStages(
  config: Config,
  catalog: DiseaseCatalog,
  logProvider: ILogProvider
): AnalyzerStage[] {
  const stages: AnalyzerStage[] = [];

  if (config.OPENAI_API_KEY) {
    stages.push({
      analyzer: new CircuitBreakerAnalyzer(
        new OpenAIVisionAnalyzer(catalog, logProvider, {
          apiKey: config.OPENAI_API_KEY,
          model: config.OPENAI_VISION_MODEL,
        }),
        logProvider
      ),
      timeoutMs: config.PRIMARY_TIMEOUT_MS,
      minConfidence: config.PRIMARY_MIN_CONFIDENCE,
    });
  }

  if (config.REKOGNITION_ENABLED) {
    stages.push({
      analyzer: new CircuitBreakerAnalyzer(
        new RekognitionLabelAnalyzer(catalog, { region: config.AWS_REGION }),
        logProvider
      ),
      timeoutMs: config.SECONDARY_TIMEOUT_MS,
    });
  }

  if (config.DEMO_FALLBACK_ENABLED) {
    stages.push({
      analyzer: new DemoAnalyzer(catalog, {
        confidenceRange: { min: config.DEMO_CONFIDENCE_MIN, max: config.DEMO_CONFIDENCE_MAX },
      }),
      timeoutMs: DEMO_TIMEOUT_MS,
    });
  }

  if (stages.length === 0) {
    logProvider.warn('No analyzer stages configured; every diagnosis will fail');
  }
  return stages;
}
