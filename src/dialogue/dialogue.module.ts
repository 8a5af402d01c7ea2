import { Module } from '@nestjs/common';
import { DialogueParser } from './dialogue-parser.service';
import { TextSegmenter } from './text-segmenter';

@Module({
  providers: [DialogueParser, TextSegmenter],
  exports: [DialogueParser, TextSegmenter],
})
export class DialogueModule {}
