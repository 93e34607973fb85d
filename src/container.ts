/**
 * Dependency wiring.
 * Constructs all services with their dependencies.
 * In production, collaborators are the AWS, OpenAI and Supabase implementations;
 * during development/testing, swap with in-memory ones.
 */

import type { DiseaseCatalog } from './catalog/DiseaseCatalog.js';
import type { AnalyzerStage } from './analyzers/IAnalyzer.js';
import type { Config } from './config.js';
import { maxBodyBytes } from './config.js';
import type { IScanRepository } from './repositories/IScanRepository.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { IMetricsProvider } from './providers/IMetricsProvider.js';
import type { ITranslationProvider } from './providers/ITranslationProvider.js';
import type { ISpeechProvider } from './providers/ISpeechProvider.js';
import type { IObjectStorage } from './providers/IObjectStorage.js';
import type { IImageProcessor } from './providers/IImageProcessor.js';
import type { Middleware } from './middleware/pipeline.js';
import { AnalysisService } from './services/AnalysisService.js';
import { CatalogService } from './services/CatalogService.js';
import { HealthService } from './services/HealthService.js';
import { ScanService } from './services/ScanService.js';
import type { ReplyFormatter } from './services/ReplyFormatter.js';
import { createLoggingMiddleware } from './middleware/logging.js';
import { bodyLimit } from './middleware/body-limit.js';

export interface Container {
  analysisService: AnalysisService;
  catalogService: CatalogService;
  scanService: ScanService;
  healthService: HealthService;
  formatter: ReplyFormatter;
  logProvider: ILogProvider;
  metrics: IMetricsProvider;
  limits: { maxImageBytes: number; maxBodyBytes: number };
  bodyLimit: Middleware;
  logging: Middleware;
}

export interface ContainerDeps {
  config: Config;
  catalog: DiseaseCatalog;
  formatter: ReplyFormatter;
  stages: AnalyzerStage[];
  imageProcessor: IImageProcessor;
  scanRepo: IScanRepository;
  logProvider: ILogProvider;
  metrics: IMetricsProvider;
  translator?: ITranslationProvider;
  speech?: ISpeechProvider;
  storage?: IObjectStorage;
  /** Backend names reported by the health endpoint. */
  backends?: { resultStore: 'supabase' | 'memory'; metrics: 'cloudwatch' | 'memory' };
  now?: () => Date;
  newId?: () => string;
}

export function createContainer(deps: ContainerDeps): Container {
  const { config } = deps;

  const analysisService = new AnalysisService({
    catalog: deps.catalog,
    stages: deps.stages,
    imageProcessor: deps.imageProcessor,
    scanRepo: deps.scanRepo,
    formatter: deps.formatter,
    logProvider: deps.logProvider,
    metrics: deps.metrics,
    translator: deps.translator,
    speech: deps.speech,
    storage: deps.storage,
    options: {
      defaultLanguage: config.DEFAULT_LANGUAGE,
      supportedLanguages: config.SUPPORTED_LANGUAGES,
      voiceReplies: config.VOICE_REPLIES,
      audioUrlTtlSeconds: config.AUDIO_URL_TTL_SECONDS,
      timeouts: {
        translateMs: config.TRANSLATE_TIMEOUT_MS,
        speechMs: config.SPEECH_TIMEOUT_MS,
        storageMs: config.STORAGE_TIMEOUT_MS,
        storeMs: config.STORE_TIMEOUT_MS,
      },
    },
    now: deps.now,
    newId: deps.newId,
  });
  const catalogService = new CatalogService(deps.catalog, config.SUPPORTED_LANGUAGES);
  const scanService = new ScanService(
    deps.scanRepo,
    deps.catalog,
    deps.logProvider,
    analysisService.audioLinks
  );
  const healthService = new HealthService({
    catalogSize: deps.catalog.size,
    pipeline: analysisService.stageEngines,
    translation: Boolean(deps.translator),
    speech: Boolean(deps.speech),
    objectStorage: Boolean(deps.storage),
    resultStore: deps.backends?.resultStore ?? 'memory',
    metrics: deps.backends?.metrics ?? 'memory',
    languages: config.SUPPORTED_LANGUAGES,
  });

  const bodyBytes = maxBodyBytes(config);

  return {
    analysisService,
    catalogService,
    scanService,
    healthService,
    formatter: deps.formatter,
    logProvider: deps.logProvider,
    metrics: deps.metrics,
    limits: { maxImageBytes: config.MAX_IMAGE_BYTES, maxBodyBytes: bodyBytes },
    bodyLimit: bodyLimit(bodyBytes),
    logging: createLoggingMiddleware(deps.logProvider),
  };
}
