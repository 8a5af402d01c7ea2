import { Module } from '@nestjs/common';
import { AudioModule } from '../audio/audio.module';
import { DialogueModule } from '../dialogue/dialogue.module';
import { MoodProfileResolver } from '../mood/mood-profile.resolver';
import { TtsModule } from '../tts/tts.module';
import { SynthesisOrchestrator } from './synthesis-orchestrator.service';

@Module({
  imports: [TtsModule, AudioModule, DialogueModule],
  providers: [SynthesisOrchestrator, MoodProfileResolver],
  exports: [SynthesisOrchestrator],
})
export class SynthesisModule {}
