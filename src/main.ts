#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { ArtifactStore } from './audio/artifact-store.service';
import { parseArgs } from './cli-options';
import { ConfigurationError, describeError } from './common/errors';
import { SYNTHESIS_SETTINGS, SynthesisSettings } from './config/synthesis.config';
import { DialogueParser } from './dialogue/dialogue-parser.service';
import { timelinePath } from './synthesis/output-paths';
import { createRunContext } from './synthesis/run-context';
import { SynthesisOrchestrator } from './synthesis/synthesis-orchestrator.service';

const logger = new Logger('DialogueSynth');

async function bootstrap() {
  const args = parseArgs(process.argv.slice(2));
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['error', 'warn', 'log'],
    abortOnError: false,
  });

  try {
    const settings = app.get<SynthesisSettings>(SYNTHESIS_SETTINGS);
    const parser = app.get(DialogueParser);
    const orchestrator = app.get(SynthesisOrchestrator);
    const store = app.get(ArtifactStore);

    const segments = await parser.parseFile(args.scriptPath);
    if (!segments.length) {
      logger.warn(`No dialogue blocks found in ${args.scriptPath}`);
      return;
    }

    const context = await createRunContext(settings, { range: args.range });
    logger.log(`Synthesizing ${segments.length} segments into ${context.outputDir}`);
    const report = await orchestrator.run(segments, context);

    const timeline = await orchestrator.buildNarrationTimeline(report);
    const timelineFile = await store.write(timelinePath(context), Buffer.from(JSON.stringify(timeline, null, 2)));

    logger.log(`Succeeded: ${report.succeeded} (${report.resumed} already present), failed: ${report.failed}`);
    for (const failure of report.failures) {
      logger.warn(
        `  #${failure.index} ${failure.speaker} chunk ${failure.chunk} after ${failure.attempts} attempt(s): ${failure.reason}`,
      );
    }
    if (report.mergedPath) {
      logger.log(`Merged audio: ${report.mergedPath}`);
    }
    if (report.mergeError) {
      logger.error(`Merge failed: ${report.mergeError}`);
    }
    logger.log(`Narration timeline: ${timelineFile}`);
  } finally {
    await app.close();
  }
}

bootstrap().catch((error) => {
  if (error instanceof ConfigurationError) {
    logger.error(`Configuration error: ${error.message}`);
  } else {
    logger.error(describeError(error));
  }
  process.exit(1);
});
