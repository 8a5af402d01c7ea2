import { Global, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { SYNTHESIS_SETTINGS, SynthesisSettings, loadSynthesisSettings } from './synthesis.config';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: SYNTHESIS_SETTINGS,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): SynthesisSettings => loadSynthesisSettings(configService),
    },
  ],
  exports: [SYNTHESIS_SETTINGS],
})
export class SettingsModule {}
