import { Logger, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { SYNTHESIS_SETTINGS, SynthesisSettings } from '../config/synthesis.config';
import { MiniMaxTtsProvider } from './minimax-tts.provider';
import { QwenTtsProvider } from './qwen-tts.provider';
import { SiliconFlowTtsProvider } from './siliconflow-tts.provider';
import { TTS_PROVIDER_TOKEN } from './tts.constants';
import { BackendName, TtsProvider } from './tts.interfaces';

export function createTtsProvider(configService: ConfigService, name: BackendName): TtsProvider {
  switch (name) {
    case 'qwen':
      return new QwenTtsProvider(configService);
    case 'siliconflow':
      return new SiliconFlowTtsProvider(configService);
    case 'minimax':
      return new MiniMaxTtsProvider(configService);
  }
}

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: TTS_PROVIDER_TOKEN,
      inject: [ConfigService, SYNTHESIS_SETTINGS],
      useFactory: (configService: ConfigService, settings: SynthesisSettings): TtsProvider => {
        const provider = createTtsProvider(configService, settings.provider);
        new Logger('TtsProvider').log(`TTS provider configured: ${provider.name} (${provider.model})`);
        return provider;
      },
    },
  ],
  exports: [TTS_PROVIDER_TOKEN],
})
export class TtsModule {}
