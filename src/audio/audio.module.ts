import { Module } from '@nestjs/common';
import { ArtifactStore } from './artifact-store.service';
import { AudioAssembler } from './audio-assembler.service';
import { AudioProbe } from './audio-probe.service';

@Module({
  providers: [ArtifactStore, AudioAssembler, AudioProbe],
  exports: [ArtifactStore, AudioAssembler, AudioProbe],
})
export class AudioModule {}
