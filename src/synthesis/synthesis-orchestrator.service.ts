import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { ArtifactStore } from '../audio/artifact-store.service';
import { AudioAssembler } from '../audio/audio-assembler.service';
import { AudioProbe } from '../audio/audio-probe.service';
import { describeError } from '../common/errors';
import { TextSegmenter } from '../dialogue/text-segmenter';
import {
  DialogueSegment,
  NarrationEntry,
  SegmentArtifact,
  SegmentStatus,
  SynthesisChunk,
  SynthesisOutcome,
  SynthesisReport,
  VoiceProfile,
} from '../domain/types';
import { MoodProfileResolver } from '../mood/mood-profile.resolver';
import { TTS_PROVIDER_TOKEN } from '../tts/tts.constants';
import { JointDialogueProvider, TtsProvider, supportsJointDialogue } from '../tts/tts.interfaces';
import { chunkPath, dialoguePath, mergedPath, segmentPath } from './output-paths';
import { SynthesisRunContext, inRange } from './run-context';

export const SLEEP = 'SLEEP';

export type Sleep = (ms: number) => Promise<void>;

const realSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

type RetryResult = { ok: true; audio: Buffer } | { ok: false; reason: string; attempts: number };

/**
 * Drives a run over parsed segments, strictly in document order with one backend call in
 * flight. Finished artifacts on disk are the only progress record: rerunning against the same
 * output directory resumes where the last run stopped. Two runs sharing an output directory
 * at the same time are not supported.
 */
@Injectable()
export class SynthesisOrchestrator {
  private readonly logger = new Logger(SynthesisOrchestrator.name);
  private readonly sleep: Sleep;

  constructor(
    @Inject(TTS_PROVIDER_TOKEN) private readonly provider: TtsProvider,
    private readonly segmenter: TextSegmenter,
    private readonly moodResolver: MoodProfileResolver,
    private readonly assembler: AudioAssembler,
    private readonly store: ArtifactStore,
    private readonly probe: AudioProbe,
    @Optional() @Inject(SLEEP) sleep?: Sleep,
  ) {
    this.sleep = sleep ?? realSleep;
  }

  async run(segments: DialogueSegment[], context: SynthesisRunContext): Promise<SynthesisReport> {
    const selected = segments.filter((segment) => inRange(segment.index, context.range));
    const report = this.createReport(context, selected);
    await this.store.ensureDir(context.outputDir);

    if (supportsJointDialogue(this.provider)) {
      await this.runJointDialogue(this.provider, selected, context, report);
      return report;
    }

    for (const [position, segment] of selected.entries()) {
      const target = segmentPath(context, segment.index, segment.speaker);
      this.logger.log(`[${position + 1}/${selected.length}] ${segment.speaker}: ${preview(segment.text)}`);

      if (await this.store.isComplete(target)) {
        this.logger.log(`Segment ${segment.index} already synthesized, skipping`);
        this.transition(report, segment.index, 'skipped');
        report.resumed += 1;
        this.recordSuccess(report, segment, target);
        continue;
      }

      let succeeded: boolean;
      try {
        succeeded = await this.synthesizeSegment(segment, target, context, report);
      } catch (error) {
        const reason = describeError(error);
        this.logger.error(`Segment ${segment.index} (${segment.speaker}) failed: ${reason}`);
        report.failures.push({ index: segment.index, speaker: segment.speaker, chunk: 0, attempts: 0, reason });
        succeeded = false;
      }

      if (succeeded) {
        this.transition(report, segment.index, 'succeeded');
        this.recordSuccess(report, segment, target);
      } else {
        this.transition(report, segment.index, 'failed');
        report.failed += 1;
      }
    }

    await this.mergeRun(report, context);
    this.logger.log(
      `Run finished: ${report.succeeded} succeeded (${report.resumed} resumed), ${report.failed} failed`,
    );
    return report;
  }

  /**
   * Probes every artifact of a report for its duration, in report order, for consumers that
   * lay the narration out on a timeline.
   */
  async buildNarrationTimeline(report: SynthesisReport): Promise<NarrationEntry[]> {
    const durations = new Map<string, number>();
    const entries: NarrationEntry[] = [];
    for (const artifact of report.artifacts) {
      let duration = durations.get(artifact.audioPath);
      if (duration === undefined) {
        duration = await this.probe.durationSeconds(artifact.audioPath);
        durations.set(artifact.audioPath, duration);
      }
      entries.push({ ...artifact, duration });
    }
    return entries;
  }

  private async synthesizeSegment(
    segment: DialogueSegment,
    target: string,
    context: SynthesisRunContext,
    report: SynthesisReport,
  ): Promise<boolean> {
    const profile = this.moodResolver.resolve(
      segment.mood,
      context.voices[segment.speaker],
      this.provider.moodCapabilities,
      context.mood,
    );
    const texts = this.segmenter.segment(segment.text, context.maxTextLength);

    if (texts.length === 1) {
      const chunk: SynthesisChunk = { segmentIndex: segment.index, ordinal: 1, text: texts[0], targetPath: target };
      return this.synthesizeChunk(chunk, segment, profile, context, report);
    }

    this.logger.log(`Segment ${segment.index} split into ${texts.length} chunks`);
    const parts: string[] = [];
    for (const [offset, text] of texts.entries()) {
      const chunk: SynthesisChunk = {
        segmentIndex: segment.index,
        ordinal: offset + 1,
        text,
        targetPath: chunkPath(context, segment.index, segment.speaker, offset + 1),
      };
      if (await this.store.isComplete(chunk.targetPath)) {
        this.logger.debug(`Chunk ${chunk.ordinal} of segment ${segment.index} already synthesized`);
      } else if (!(await this.synthesizeChunk(chunk, segment, profile, context, report))) {
        return false;
      }
      parts.push(chunk.targetPath);
    }

    await this.assembler.merge(parts, target, context.partSilenceSeconds);
    await this.store.remove(parts);
    return true;
  }

  private async synthesizeChunk(
    chunk: SynthesisChunk,
    segment: DialogueSegment,
    profile: VoiceProfile,
    context: SynthesisRunContext,
    report: SynthesisReport,
  ): Promise<boolean> {
    const result = await this.withRetries(segment.index, `chunk ${chunk.ordinal}`, context, report, () =>
      context.streaming ? this.provider.synthesizeStreaming(chunk.text, profile) : this.provider.synthesize(chunk.text, profile),
    );

    if (!result.ok) {
      this.logger.error(
        `Segment ${segment.index} (${segment.speaker}) chunk ${chunk.ordinal} failed after ${result.attempts} attempt(s): ${result.reason}`,
      );
      report.failures.push({
        index: segment.index,
        speaker: segment.speaker,
        chunk: chunk.ordinal,
        attempts: result.attempts,
        reason: result.reason,
      });
      return false;
    }

    await this.store.write(chunk.targetPath, result.audio);
    await this.pause(context.requestDelaySeconds);
    return true;
  }

  private async withRetries(
    index: number,
    label: string,
    context: SynthesisRunContext,
    report: SynthesisReport,
    call: () => Promise<SynthesisOutcome>,
  ): Promise<RetryResult> {
    const maxAttempts = context.maxRetries + 1;
    let reason = 'no attempt made';
    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      this.transition(report, index, 'synthesizing');
      const outcome = await call();
      if (outcome.ok) {
        return outcome;
      }

      reason = outcome.reason;
      if (attempt < maxAttempts) {
        const delaySeconds = context.retryDelaySeconds * attempt;
        this.transition(report, index, 'retrying');
        this.logger.warn(
          `Segment ${index} ${label} failed (attempt ${attempt}/${maxAttempts}): ${reason}; retrying in ${delaySeconds}s`,
        );
        await this.pause(delaySeconds);
      }
    }
    return { ok: false, reason, attempts: maxAttempts };
  }

  private async runJointDialogue(
    provider: JointDialogueProvider,
    segments: DialogueSegment[],
    context: SynthesisRunContext,
    report: SynthesisReport,
  ): Promise<void> {
    const target = dialoguePath(context);
    if (!segments.length) {
      return;
    }

    if (await this.store.isComplete(target)) {
      this.logger.log(`Dialogue audio ${target} already exists, skipping`);
      for (const segment of segments) {
        this.transition(report, segment.index, 'skipped');
        report.resumed += 1;
        this.recordSuccess(report, segment, target);
      }
      return;
    }

    this.logger.log(`Synthesizing ${segments.length} lines as one dialogue with ${provider.model}`);
    const lines = segments.map((segment) => ({ speaker: segment.speaker, text: segment.text }));
    const first = segments[0];
    const result = await this.withRetries(first.index, 'dialogue', context, report, () =>
      provider.synthesizeDialogue(lines, context.references, context.voices.primary),
    );

    if (!result.ok) {
      this.logger.error(`Dialogue synthesis failed after ${result.attempts} attempt(s): ${result.reason}`);
      report.failures.push({
        index: first.index,
        speaker: first.speaker,
        chunk: 1,
        attempts: result.attempts,
        reason: result.reason,
      });
      for (const segment of segments) {
        this.transition(report, segment.index, 'failed');
      }
      report.failed = segments.length;
      return;
    }

    await this.store.write(target, result.audio);
    for (const segment of segments) {
      this.transition(report, segment.index, 'succeeded');
      this.recordSuccess(report, segment, target);
    }
    this.logger.log(`Dialogue audio written to ${target}`);
  }

  private async mergeRun(report: SynthesisReport, context: SynthesisRunContext): Promise<void> {
    if (!context.mergeAudio || report.succeeded <= 1) {
      return;
    }
    if (context.range) {
      this.logger.log('Index range active, skipping the full merge');
      return;
    }

    const target = mergedPath(context);
    if (await this.store.isComplete(target)) {
      this.logger.log(`Merged audio ${target} already exists, skipping`);
      report.mergedPath = target;
      return;
    }

    try {
      await this.assembler.merge(
        report.artifacts.map((artifact) => artifact.audioPath),
        target,
        context.silenceBetweenSeconds,
      );
      report.mergedPath = target;
    } catch (error) {
      report.mergeError = describeError(error);
      this.logger.error(`Failed to merge run audio into ${target}: ${report.mergeError}`);
    }
  }

  private createReport(context: SynthesisRunContext, segments: DialogueSegment[]): SynthesisReport {
    const states: Record<number, SegmentStatus> = {};
    for (const segment of segments) {
      states[segment.index] = 'pending';
    }
    return {
      outputDir: context.outputDir,
      succeeded: 0,
      failed: 0,
      resumed: 0,
      states,
      artifacts: [],
      failures: [],
    };
  }

  private recordSuccess(report: SynthesisReport, segment: DialogueSegment, audioPath: string): void {
    const artifact: SegmentArtifact = {
      index: segment.index,
      speaker: segment.speaker,
      text: segment.text,
      mood: segment.mood,
      audioPath,
    };
    report.artifacts.push(artifact);
    report.succeeded += 1;
  }

  private transition(report: SynthesisReport, index: number, state: SegmentStatus): void {
    const previous = report.states[index];
    if (previous !== state) {
      this.logger.debug(`Segment ${index}: ${previous ?? 'pending'} -> ${state}`);
    }
    report.states[index] = state;
  }

  private async pause(seconds: number): Promise<void> {
    if (seconds > 0) {
      await this.sleep(seconds * 1000);
    }
  }
}

function preview(text: string): string {
  return text.length > 50 ? `${text.slice(0, 50)}...` : text;
}
