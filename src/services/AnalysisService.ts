/**
 * Diagnosis pipeline.
 *
 * Preprocesses the upload, runs the analyzer stages in order (first success
 * wins, each bounded by its own timeout), resolves the result against the
 * catalog, localizes it, optionally voices it, archives the image and records
 * the scan. An undecodable image and "every stage failed" are fatal. Every
 * collaborator call after that has its own deadline, and a failure or timeout
 * there degrades the result and is reported through flags and warnings.
 */

import { randomUUID } from 'node:crypto';
import {
  AnalysisUnavailableError,
  AnalyzerError,
  errorMessage,
} from '../errors.js';
import type { DiseaseCatalog } from '../catalog/DiseaseCatalog.js';
import type { AnalyzerStage } from '../analyzers/IAnalyzer.js';
import type { IScanRepository } from '../repositories/IScanRepository.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { IMetricsProvider } from '../providers/IMetricsProvider.js';
import type { ITranslationProvider } from '../providers/ITranslationProvider.js';
import type { ISpeechProvider } from '../providers/ISpeechProvider.js';
import type { IObjectStorage } from '../providers/IObjectStorage.js';
import type { IImageProcessor } from '../providers/IImageProcessor.js';
import type {
  AnalysisResult,
  DiseaseDetails,
  DiseaseRecord,
  ImageInput,
  ScanRecord,
  SourceEngine,
} from '../types/models.js';
import { ENGINE_TRAITS } from '../types/models.js';
import { withTimeout } from '../utils/timeout.js';
import { extensionFor } from './image-input.js';
import { localizeTexts, type LocalizableText } from './localize.js';
import { AudioLinks } from './AudioLinks.js';
import type { ReplyFormatter } from './ReplyFormatter.js';

export const STORE_FAILURE_WARNING = 'history and analytics will not reflect this scan';
export const ANONYMOUS_REQUESTER = 'anonymous';

export interface AnalyzeInput {
  image: ImageInput;
  /** Requested output language; unsupported codes fall back to the default. */
  language?: string;
  requesterId?: string;
  /** Request a spoken reply. Also on when voice replies are enabled globally. */
  voice?: boolean;
}

export interface AnalysisOutcome {
  scan: ScanRecord;
  /** False when the Result Store rejected the scan. */
  persisted: boolean;
  warnings: string[];
  /** Freshly signed link to the voice reply, when one was produced. */
  audioUrl: string | null;
}

export interface CollaboratorTimeouts {
  translateMs: number;
  speechMs: number;
  /** Applies to each object storage call. */
  storageMs: number;
  storeMs: number;
}

export interface AnalysisServiceOptions {
  defaultLanguage: string;
  supportedLanguages: string[];
  voiceReplies: boolean;
  audioUrlTtlSeconds: number;
  timeouts: CollaboratorTimeouts;
}

export interface AnalysisServiceDeps {
  catalog: DiseaseCatalog;
  stages: AnalyzerStage[];
  imageProcessor: IImageProcessor;
  scanRepo: IScanRepository;
  formatter: ReplyFormatter;
  logProvider: ILogProvider;
  metrics: IMetricsProvider;
  translator?: ITranslationProvider;
  speech?: ISpeechProvider;
  storage?: IObjectStorage;
  options: AnalysisServiceOptions;
  /** Injectable for tests. */
  now?: () => Date;
  newId?: () => string;
}

export class AnalysisService {
  private readonly now: () => Date;
  private readonly newId: () => string;
  readonly audioLinks: AudioLinks;

  constructor(private readonly deps: AnalysisServiceDeps) {
    this.now = deps.now ?? (() => new Date());
    this.newId = deps.newId ?? randomUUID;
    this.audioLinks = new AudioLinks(
      deps.storage,
      { ttlSeconds: deps.options.audioUrlTtlSeconds, timeoutMs: deps.options.timeouts.storageMs },
      deps.logProvider
    );
  }

  /** Engines of the configured stages, in order. */
  get stageEngines(): SourceEngine[] {
    return this.deps.stages.map((s) => s.analyzer.engine);
  }

  async analyze(input: AnalyzeInput): Promise<AnalysisOutcome> {
    const startedAt = Date.now();
    const { logProvider, metrics, options } = this.deps;
    const warnings: string[] = [];
    const scanId = this.newId();
    const requesterId = input.requesterId?.trim() || ANONYMOUS_REQUESTER;
    const language = this.resolveLanguage(input.language, scanId);

    const { image, preprocessing } = await this.deps.imageProcessor.prepare(input.image);
    const analysis = await this.runStages(image, scanId);

    const notes: string[] = [];
    if (analysis.notes) notes.push(analysis.notes);
    const record = this.resolveDisease(analysis, notes);
    const resolved: AnalysisResult = { ...analysis, diseaseKey: record?.key ?? null };

    const english: LocalizableText = {
      diseaseName: record?.displayName ?? this.deps.formatter.labels('en').unknownDisease,
      disease: record ? toDetails(record) : null,
      observedSymptoms: [...analysis.observedSymptoms],
    };
    const { text, degraded: translationDegraded } = await this.localize(
      english,
      record,
      language,
      scanId
    );
    if (translationDegraded) {
      warnings.push(`translation to ${language} unavailable; reply is in English`);
    }

    const traits = ENGINE_TRAITS[resolved.sourceEngine];
    const scan: ScanRecord = {
      scanId,
      requesterId,
      imageRef: null,
      language,
      createdAt: this.now(),
      result: {
        analysis: resolved,
        diseaseName: text.diseaseName,
        disease: text.disease,
        observedSymptoms: text.observedSymptoms,
        notes,
        nonAuthoritative: !traits.authoritative,
        lowFidelity: traits.lowFidelity,
        translationDegraded,
        speechDegraded: false,
        audioRef: null,
        preprocessing,
        latencyMs: 0,
      },
    };

    let audioUrl: string | null = null;
    if (input.voice || options.voiceReplies) {
      scan.result.audioRef = await this.voice(scan);
      audioUrl = await this.audioLinks.urlFor(scan);
      if (!audioUrl) {
        scan.result.speechDegraded = true;
        warnings.push('voice reply unavailable');
      }
    }

    scan.imageRef = await this.archiveImage(scanId, image);
    scan.result.latencyMs = Date.now() - startedAt;

    let persisted = true;
    try {
      await withTimeout(
        (signal) => this.deps.scanRepo.put(scan, signal),
        options.timeouts.storeMs,
        'scan store'
      );
    } catch (err) {
      persisted = false;
      warnings.push(STORE_FAILURE_WARNING);
      metrics.put({ name: 'StoreFailures', value: 1, unit: 'Count' });
      logProvider.error('Scan not persisted', { scanId, error: errorMessage(err) });
    }

    metrics.put({
      name: 'ScanCompleted',
      value: 1,
      unit: 'Count',
      dimensions: { engine: resolved.sourceEngine },
    });
    metrics.put({ name: 'PipelineLatency', value: scan.result.latencyMs, unit: 'Milliseconds' });
    logProvider.info('Scan completed', {
      scanId,
      engine: resolved.sourceEngine,
      diseaseKey: resolved.diseaseKey,
      confidence: resolved.confidence,
      language,
      latencyMs: scan.result.latencyMs,
      imageResized: preprocessing.resized,
      persisted,
    });

    return { scan, persisted, warnings, audioUrl };
  }

  private resolveLanguage(requested: string | undefined, scanId: string): string {
    const { defaultLanguage, supportedLanguages } = this.deps.options;
    const code = requested?.trim().toLowerCase();
    if (!code) return defaultLanguage;
    if (supportedLanguages.includes(code)) return code;

    this.deps.logProvider.warn('Unsupported language, using default', {
      scanId,
      requested,
      language: defaultLanguage,
    });
    return defaultLanguage;
  }

  private async runStages(image: ImageInput, scanId: string): Promise<AnalysisResult> {
    const { stages, logProvider, metrics } = this.deps;
    const attempts: Array<{ engine: SourceEngine; error: string }> = [];

    for (const stage of stages) {
      const { engine } = stage.analyzer;
      try {
        const result = await withTimeout(
          (signal) => stage.analyzer.infer(image, signal),
          stage.timeoutMs,
          engine
        );
        const min = stage.minConfidence ?? 0;
        if (result.confidence < min) {
          throw new AnalyzerError(
            engine,
            `Confidence ${result.confidence} below threshold ${min}`
          );
        }
        if (attempts.length > 0) {
          logProvider.info('Fallback stage succeeded', { scanId, engine, after: attempts });
        }
        return result;
      } catch (err) {
        const message = errorMessage(err);
        attempts.push({ engine, error: message });
        metrics.put({ name: 'AnalyzerFailures', value: 1, unit: 'Count', dimensions: { engine } });
        logProvider.warn('Analyzer stage failed', { scanId, engine, error: message });
      }
    }

    logProvider.error('All analyzer stages failed', { scanId, attempts });
    throw new AnalysisUnavailableError(attempts);
  }

  private resolveDisease(analysis: AnalysisResult, notes: string[]): DiseaseRecord | null {
    if (analysis.diseaseKey === null) return null;

    const record = this.deps.catalog.lookup(analysis.diseaseKey);
    if (!record) {
      notes.push(`Reported disease "${analysis.diseaseKey}" is not in catalog`);
      this.deps.logProvider.warn('Disease not in catalog', { diseaseKey: analysis.diseaseKey });
    }
    return record;
  }

  private async localize(
    english: LocalizableText,
    record: DiseaseRecord | null,
    language: string,
    scanId: string
  ): Promise<{ text: LocalizableText; degraded: boolean }> {
    if (language === this.deps.options.defaultLanguage) {
      return { text: english, degraded: false };
    }

    // Catalog-provided localization is used as-is and never sent for translation.
    const fromCatalog = record !== null && record.localizedLanguage === language;
    const base: LocalizableText = fromCatalog
      ? {
          ...english,
          diseaseName: record.localizedName,
          disease: english.disease && {
            ...english.disease,
            description: record.localizedDescription,
          },
        }
      : english;
    const skip = { skipName: fromCatalog, skipDescription: fromCatalog };

    const { translator, logProvider, options } = this.deps;
    if (!translator) {
      logProvider.warn('No translator configured', { scanId, language });
      return { text: base, degraded: true };
    }

    try {
      const text = await withTimeout(
        (signal) => localizeTexts(base, translator, language, skip, signal),
        options.timeouts.translateMs,
        'translation'
      );
      return { text, degraded: false };
    } catch (err) {
      logProvider.warn('Translation failed, replying untranslated', {
        scanId,
        language,
        error: errorMessage(err),
      });
      return { text: base, degraded: true };
    }
  }

  /** Returns the storage reference of the spoken reply, or null when any step failed. */
  private async voice(scan: ScanRecord): Promise<string | null> {
    const { speech, storage, formatter, logProvider } = this.deps;
    const { timeouts } = this.deps.options;
    if (!speech || !storage) {
      logProvider.warn('Voice reply requested but speech or storage is not configured', {
        scanId: scan.scanId,
      });
      return null;
    }

    try {
      const audio = await withTimeout(
        (signal) => speech.synthesize(formatter.speechText(scan), scan.language, signal),
        timeouts.speechMs,
        'speech synthesis'
      );
      return await withTimeout(
        () => storage.put(`audio/${scan.scanId}.mp3`, audio.bytes, audio.contentType),
        timeouts.storageMs,
        'audio upload'
      );
    } catch (err) {
      logProvider.warn('Voice reply failed', { scanId: scan.scanId, error: errorMessage(err) });
      return null;
    }
  }

  private async archiveImage(scanId: string, image: ImageInput): Promise<string | null> {
    const { storage, logProvider, options } = this.deps;
    if (!storage) return null;

    try {
      return await withTimeout(
        () =>
          storage.put(
            `images/${scanId}.${extensionFor(image.mediaType)}`,
            image.bytes,
            image.mediaType
          ),
        options.timeouts.storageMs,
        'image archive'
      );
    } catch (err) {
      logProvider.warn('Image archive failed', { scanId, error: errorMessage(err) });
      return null;
    }
  }
}

export function toDetails(record: DiseaseRecord): DiseaseDetails {
  return {
    key: record.key,
    crop: record.crop,
    displayName: record.displayName,
    localizedName: record.localizedName,
    scientificName: record.scientificName,
    category: record.category,
    description: record.description,
    symptoms: [...record.symptoms],
    treatments: record.treatments.map((t) => ({ ...t })),
    organicTreatments: [...record.organicTreatments],
    preventionTips: [...record.preventionTips],
    favorableConditions: record.favorableConditions,
  };
}
