import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AudioModule } from './audio/audio.module';
import { SettingsModule } from './config/settings.module';
import { DialogueModule } from './dialogue/dialogue.module';
import { SynthesisModule } from './synthesis/synthesis.module';
import { TtsModule } from './tts/tts.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }),
    SettingsModule,
    DialogueModule,
    TtsModule,
    AudioModule,
    SynthesisModule,
  ],
})
export class AppModule {}
