#!/usr/bin/env node
import { promises as fs } from 'fs';
import path from 'path';
import { simpleParser, ParsedMail } from 'mailparser';
import { ArbitrationProvider } from '../arbitration/ArbitrationProvider';
import { createArbitrationProvider } from '../arbitration/createArbitrationProvider';
import { AxisRegistry } from '../classification/AxisRegistry';
import { CategoryValidationReport, CategoryValidator } from '../classification/CategoryValidator';
import { serializeClassificationContext } from '../classification/ClassificationContext';
import { MultiAxisOrchestrator } from '../classification/MultiAxisOrchestrator';
import { EmailMessage, HybridClassificationOutput } from '../classification/types';
import {
  OrchestratorSettingsInput,
  createAxisRegistry,
  settingsFromConfig,
} from '../config/classification';
import logger from '../utils/logger';

interface CliOptions {
  files: string[];
  summary?: string;
  threshold?: number;
}

export interface ClassificationDeps {
  registry?: AxisRegistry;
  provider?: ArbitrationProvider;
  settings?: OrchestratorSettingsInput;
  summary?: string;
}

export interface ClassificationRun {
  output: HybridClassificationOutput;
  context: string;
  validation: CategoryValidationReport;
}

function parseArgs(): CliOptions {
  const args = process.argv.slice(2);
  const options: CliOptions = { files: [] };
  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--summary' && args[i + 1]) {
      options.summary = args[++i];
    } else if (args[i] === '--threshold' && args[i + 1]) {
      options.threshold = Number(args[++i]);
    } else {
      options.files.push(args[i]);
    }
  }
  return options;
}

/**
 * Parse .eml files into messages, in the order given.
 */
export async function loadMessages(filePaths: readonly string[]): Promise<EmailMessage[]> {
  const messages: EmailMessage[] = [];
  for (const filePath of filePaths) {
    const raw = await fs.readFile(filePath);
    const parsed: ParsedMail = await simpleParser(raw);
    messages.push({
      subject: parsed.subject ?? '',
      body: parsed.text ?? '',
    });
    logger.debug('Message loaded', { file: path.basename(filePath), subject: parsed.subject });
  }
  return messages;
}

export async function runClassification(
  filePaths: readonly string[],
  deps: ClassificationDeps = {}
): Promise<ClassificationRun> {
  const registry = deps.registry ?? createAxisRegistry();
  const orchestrator = new MultiAxisOrchestrator({
    registry,
    provider: deps.provider ?? createArbitrationProvider(),
    settings: deps.settings ?? settingsFromConfig(),
  });

  const messages = await loadMessages(filePaths);
  const output = await orchestrator.classifyConversation(messages, deps.summary);
  const validation = new CategoryValidator(registry).validate(output.categories);

  return {
    output,
    context: serializeClassificationContext(output),
    validation,
  };
}

export async function main(optionsOverride?: CliOptions) {
  const options = optionsOverride ?? parseArgs();
  if (options.files.length === 0) {
    throw new Error('Usage: classify-emails [--summary <text>] [--threshold <n>] <file.eml>...');
  }

  const settings = settingsFromConfig();
  const run = await runClassification(options.files, {
    summary: options.summary,
    settings: {
      ...settings,
      confidenceThreshold: options.threshold ?? settings.confidenceThreshold,
    },
  });

  logger.info('Conversation classified', {
    files: options.files.length,
    categories: run.validation.clean,
    serialNumbers: run.output.serialNumbers,
    rejected: run.validation.rejected,
  });
  logger.info('Classification context', { context: run.context });
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error('Failed to classify emails', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  });
}
