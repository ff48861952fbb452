import { Module } from '@nestjs/common';
import { CloudCodeController } from './cloudcode.controller';
import { CloudCodeService } from './cloudcode.service';
import { GeminiController } from './gemini.controller';
import { UpstreamModule } from './upstream.module';
import { GeminiNormalizerService } from './services/gemini-normalizer.service';
import { RequestPreparerService } from './services/request-preparer.service';
import { RequestTransformerService } from './services/request-transformer.service';
import { ResponseTransformerService } from './services/response-transformer.service';
import { StreamTransformerService } from './services/stream-transformer.service';
import { TransformerService } from './services/transformer.service';
import { ProjectModule } from '../project/project.module';

@Module({
  imports: [UpstreamModule, ProjectModule],
  controllers: [CloudCodeController, GeminiController],
  providers: [
    CloudCodeService,
    GeminiNormalizerService,
    RequestPreparerService,
    RequestTransformerService,
    ResponseTransformerService,
    StreamTransformerService,
    TransformerService,
  ],
  exports: [CloudCodeService],
})
export class CloudCodeModule {}
