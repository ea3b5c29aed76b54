/**
 * Multi-Axis Orchestrator
 * Runs every configured axis in dependency order for one email or one
 * conversation and aggregates the per-axis decisions. Earlier labels are
 * handed to later axes as arbitration context, so order matters.
 */

import { ArbitrationProvider } from '../arbitration/ArbitrationProvider';
import { OrchestratorSettingsInput, resolveOrchestratorSettings } from '../config/classification';
import { wrapError } from '../errors';
import logger from '../utils/logger';
import { AxisRegistry } from './AxisRegistry';
import { AxisScoringEngine } from './AxisScoringEngine';
import { HybridAxisDecision } from './HybridAxisDecision';
import {
  AxisClassificationResult,
  AxisConfiguration,
  EmailMessage,
  HybridClassificationOutput,
} from './types';

export const DEFAULT_AXIS_ORDER: readonly string[] = [
  'message_type',
  'status',
  'client',
  'deal',
  'project',
  'supplier',
  'equipment_type',
  'equipment_designation',
  'test_campaign',
  'technical_domain',
  'quality',
  'milestone',
  'anomaly',
  'nrb',
];

export const SUBJECT_SEPARATOR = ' | ';
export const BODY_SEPARATOR = '\n\n---\n\n';
/** Body characters used as arbitration context when no summary is given */
export const BODY_EXCERPT_LIMIT = 1000;

export interface MultiAxisOrchestratorOptions {
  registry: AxisRegistry;
  provider: ArbitrationProvider;
  settings?: OrchestratorSettingsInput;
}

interface AxisPipeline {
  engine: AxisScoringEngine;
  decision: HybridAxisDecision;
}

export class MultiAxisOrchestrator {
  private readonly pipelines = new Map<string, AxisPipeline>();
  private readonly confidenceThreshold: number;
  private readonly axisOrder: readonly string[];

  constructor(options: MultiAxisOrchestratorOptions) {
    const settings = resolveOrchestratorSettings(options.settings ?? {});
    this.confidenceThreshold = settings.confidenceThreshold;
    this.axisOrder = settings.axisOrder.length > 0 ? settings.axisOrder : DEFAULT_AXIS_ORDER;

    for (const axis of options.registry.list()) {
      this.pipelines.set(axis.id, {
        engine: new AxisScoringEngine(axis),
        decision: new HybridAxisDecision(options.provider),
      });
    }
  }

  /**
   * Classify a single email.
   * @param summary    Used as arbitration context instead of a raw excerpt
   * @param axisOrder  Overrides the configured processing order for this call
   */
  async classify(
    subject: string,
    body: string,
    summary?: string,
    axisOrder?: readonly string[]
  ): Promise<HybridClassificationOutput> {
    const startTime = Date.now();
    const context = summary && summary.trim()
      ? summary
      : `Subject: ${subject}\n\nBody: ${body.slice(0, BODY_EXCERPT_LIMIT)}`;

    const axes: Record<string, AxisClassificationResult> = {};
    const resolved: Record<string, string | null> = {};
    const serialNumbers = new Set<string>();

    for (const axisId of axisOrder ?? this.axisOrder) {
      const pipeline = this.pipelines.get(axisId);
      if (!pipeline) {
        logger.debug('Skipping unknown axis', { axisId });
        continue;
      }

      const result = await this.classifyAxis(pipeline, subject, body, context, resolved);
      for (const serial of result.serialNumbers) {
        serialNumbers.add(serial);
      }

      axes[axisId] = result;
      resolved[axisId] = result.value;
    }

    const results = Object.values(axes);
    const categories = results
      .filter((result) => result.value !== null && result.confidence >= this.confidenceThreshold)
      .map((result) => result.value)
      .filter((value): value is string => value !== null);

    logger.info('Email classified', {
      axes: results.length,
      categories: categories.length,
      arbitrated: results.filter((result) => result.method === 'llm').length,
      duration: Date.now() - startTime,
    });

    return {
      axes,
      serialNumbers: [...serialNumbers].sort(),
      categories,
    };
  }

  /**
   * Classify a conversation as one document: subjects are pipe-joined and
   * bodies separator-joined, empty ones skipped.
   */
  async classifyConversation(
    messages: readonly EmailMessage[],
    summary?: string,
    axisOrder?: readonly string[]
  ): Promise<HybridClassificationOutput> {
    const subject = messages
      .map((message) => message.subject ?? '')
      .filter(Boolean)
      .join(SUBJECT_SEPARATOR);
    const body = messages
      .map((message) => message.body ?? '')
      .filter(Boolean)
      .join(BODY_SEPARATOR);

    return this.classify(subject, body, summary, axisOrder);
  }

  get processingOrder(): readonly string[] {
    return this.axisOrder;
  }

  private async classifyAxis(
    pipeline: AxisPipeline,
    subject: string,
    body: string,
    context: string,
    resolved: Readonly<Record<string, string | null>>
  ): Promise<AxisClassificationResult> {
    try {
      const heuristic = pipeline.engine.run(subject, body);
      const result = await pipeline.decision.classify(heuristic, context, resolved);

      logger.debug('Axis classified', {
        axisId: result.axisId,
        value: result.value,
        confidence: result.confidence,
        method: result.method,
      });
      return result;
    } catch (error) {
      const failure = wrapError(error);
      logger.error('Axis classification failed', {
        axisId: pipeline.engine.axis.id,
        error: failure.message,
      });
      return failedAxisResult(pipeline.engine.axis, failure.message);
    }
  }
}

function failedAxisResult(axis: AxisConfiguration, error: string): AxisClassificationResult {
  const result: AxisClassificationResult = {
    axisId: axis.id,
    prefix: axis.prefix,
    value: null,
    confidence: 0,
    method: 'none',
    candidates: [],
    serialNumbers: [],
    debug: { rawHits: {}, scores: {}, error },
  };
  return Object.freeze(result);
}
