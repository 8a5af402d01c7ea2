import { promises as fs } from 'fs';
import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { SYNTHESIS_SETTINGS, SynthesisSettings } from '../config/synthesis.config';
import { DialogueSegment, Mood, Speaker, isMood } from '../domain/types';

export const FORMAT_DETECTION_STRATEGY = 'FORMAT_DETECTION_STRATEGY';

export type ScriptFormat = 'extended' | 'legacy';

export type FormatDetectionStrategy = (extendedCount: number, legacyCount: number) => ScriptFormat;

export type DialogueParseOptions = Pick<
  SynthesisSettings,
  'useTextMood' | 'defaultMood' | 'stripAsides' | 'localizeFigures' | 'figureLabel'
>;

// Override through FORMAT_DETECTION_STRATEGY.
export const defaultFormatDetection: FormatDetectionStrategy = (extendedCount, legacyCount) =>
  extendedCount > 0 && extendedCount >= legacyCount / 2 ? 'extended' : 'legacy';

const EXTENDED_BLOCK =
  /###\s*(primary|secondary|male|female)\s*speaker\s*###\s*\n\s*###\s*(\w+)\s*###\s*\n\s*###\s*([\s\S]*?)\s*###/gi;
const LEGACY_BLOCK = /###\s*(primary|secondary|male|female)\s*speaker\s*###\s*\n\s*###\s*([\s\S]*?)\s*###/gi;

const ASIDE = /[（(][^）)]+[）)]/g;
const FIGURE_REFERENCE = /Figure\s*(\d+)/gi;

@Injectable()
export class DialogueParser {
  private readonly logger = new Logger(DialogueParser.name);
  private readonly detectFormat: FormatDetectionStrategy;

  constructor(
    @Inject(SYNTHESIS_SETTINGS) private readonly options: DialogueParseOptions,
    @Optional() @Inject(FORMAT_DETECTION_STRATEGY) detectFormat?: FormatDetectionStrategy,
  ) {
    this.detectFormat = detectFormat ?? defaultFormatDetection;
  }

  async parseFile(filePath: string): Promise<DialogueSegment[]> {
    const content = await fs.readFile(filePath, 'utf-8');
    return this.parse(content);
  }

  parse(content: string): DialogueSegment[] {
    const extendedCount = Array.from(content.matchAll(EXTENDED_BLOCK)).length;
    const legacyCount = Array.from(content.matchAll(LEGACY_BLOCK)).length;
    const format = this.detectFormat(extendedCount, legacyCount);

    const segments: DialogueSegment[] = [];
    const pattern = format === 'extended' ? EXTENDED_BLOCK : LEGACY_BLOCK;
    for (const match of content.matchAll(pattern)) {
      const speakerToken = match[1];
      const moodToken = format === 'extended' ? match[2] : undefined;
      const rawText = format === 'extended' ? match[3] : match[2];
      if (!speakerToken || rawText === undefined) {
        continue;
      }

      const text = this.clean(rawText);
      if (!text) {
        continue;
      }
      segments.push({
        index: segments.length + 1,
        speaker: this.toSpeaker(speakerToken),
        text,
        mood: this.toMood(moodToken),
      });
    }

    this.logger.log(
      `Parsed ${segments.length} segments (${format} format; ${extendedCount} extended / ${legacyCount} legacy blocks)`,
    );
    return segments;
  }

  private toSpeaker(token: string): Speaker {
    const normalized = token.toLowerCase();
    return normalized === 'primary' || normalized === 'male' ? 'primary' : 'secondary';
  }

  private toMood(token: string | undefined): Mood {
    if (!this.options.useTextMood || !token) {
      return this.options.defaultMood;
    }
    const normalized = token.toLowerCase();
    if (isMood(normalized)) {
      return normalized;
    }
    this.logger.debug(`Unknown mood "${token}", using ${this.options.defaultMood}`);
    return this.options.defaultMood;
  }

  private clean(text: string): string {
    let cleaned = text.replace(/\r?\n/g, ' ').replace(/\s+/g, ' ').trim();
    if (this.options.stripAsides) {
      cleaned = cleaned.replace(ASIDE, '');
    }
    if (this.options.localizeFigures) {
      const label = this.options.figureLabel;
      cleaned = cleaned.replace(FIGURE_REFERENCE, (_match, figure: string) => `${label}${figure}`);
    }
    return cleaned.replace(/\s+/g, ' ').trim();
  }
}
