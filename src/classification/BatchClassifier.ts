/**
 * Batch Classifier
 *
 * Classifies many conversations with a bounded number in flight.
 * - Output keeps input order
 * - Progress reported through a callback and a 'progress' event
 * - Emits 'complete' with the run summary
 */

import { EventEmitter } from 'events';
import { config } from '../config';
import logger from '../utils/logger';
import { MultiAxisOrchestrator } from './MultiAxisOrchestrator';
import { EmailMessage, HybridClassificationOutput } from './types';

export interface BatchItem {
  id: string;
  messages: EmailMessage[];
  summary?: string;
}

export interface BatchItemResult {
  id: string;
  output: HybridClassificationOutput;
  durationMs: number;
}

export interface BatchProgressEvent {
  id: string;
  completed: number;
  total: number;
  /** 0-100 */
  overallProgress: number;
}

export interface BatchClassificationOptions {
  maxConcurrent?: number;
  onProgress?: (progress: BatchProgressEvent) => void;
}

export interface BatchClassificationSummary {
  total: number;
  processingTimeMs: number;
  averageItemTimeMs: number;
}

export class BatchClassifier extends EventEmitter {
  constructor(private readonly orchestrator: MultiAxisOrchestrator) {
    super();
  }

  async classifyAll(
    items: readonly BatchItem[],
    options: BatchClassificationOptions = {}
  ): Promise<BatchItemResult[]> {
    const maxConcurrent = Math.max(1, options.maxConcurrent ?? config.classification.maxConcurrent);
    const startTime = Date.now();
    const results: BatchItemResult[] = new Array<BatchItemResult>(items.length);
    let completed = 0;

    logger.info('Starting batch classification', {
      totalItems: items.length,
      maxConcurrent,
    });

    const classifyItem = async (index: number): Promise<void> => {
      const item = items[index];
      const itemStart = Date.now();
      const output = await this.orchestrator.classifyConversation(item.messages, item.summary);
      results[index] = { id: item.id, output, durationMs: Date.now() - itemStart };

      completed++;
      const progress: BatchProgressEvent = {
        id: item.id,
        completed,
        total: items.length,
        overallProgress: Math.round((completed / items.length) * 100),
      };
      options.onProgress?.(progress);
      this.emit('progress', progress);
    };

    await this.processConcurrently(items.length, classifyItem, maxConcurrent);

    const processingTimeMs = Date.now() - startTime;
    const summary: BatchClassificationSummary = {
      total: items.length,
      processingTimeMs,
      averageItemTimeMs: results.length > 0
        ? Math.round(results.reduce((sum, result) => sum + result.durationMs, 0) / results.length)
        : 0,
    };

    logger.info('Batch classification complete', { ...summary });
    this.emit('complete', summary);

    return results;
  }

  /**
   * Run processor over indices [0, count) with at most `limit` running
   */
  private async processConcurrently(
    count: number,
    processor: (index: number) => Promise<void>,
    limit: number
  ): Promise<void> {
    let nextIndex = 0;

    const worker = async (): Promise<void> => {
      while (nextIndex < count) {
        const index = nextIndex++;
        await processor(index);
      }
    };

    const workers: Promise<void>[] = [];
    for (let i = 0; i < Math.min(limit, count); i++) {
      workers.push(worker());
    }

    await Promise.all(workers);
  }
}
