import path from 'path';
import { Speaker } from '../domain/types';
import { SynthesisRunContext } from './run-context';

type PathContext = Pick<SynthesisRunContext, 'outputDir' | 'prefix'>;

export function segmentFileName(prefix: string, index: number, speaker: Speaker, part?: number): string {
  const base = `${prefix}_${String(index).padStart(3, '0')}_${speaker}`;
  return part === undefined ? `${base}.wav` : `${base}_part${part}.wav`;
}

export function segmentPath(context: PathContext, index: number, speaker: Speaker): string {
  return path.join(context.outputDir, segmentFileName(context.prefix, index, speaker));
}

export function chunkPath(context: PathContext, index: number, speaker: Speaker, part: number): string {
  return path.join(context.outputDir, segmentFileName(context.prefix, index, speaker, part));
}

export function mergedPath(context: PathContext): string {
  return path.join(context.outputDir, `${context.prefix}_complete.wav`);
}

export function dialoguePath(context: PathContext): string {
  return path.join(context.outputDir, `${context.prefix}_dialogue_combined.wav`);
}

export function timelinePath(context: PathContext): string {
  return path.join(context.outputDir, `${context.prefix}_timeline.json`);
}
