import { Module } from '@nestjs/common';
import { ProjectService } from './project.service';
import { UpstreamModule } from '../cloudcode/upstream.module';

@Module({
  imports: [UpstreamModule],
  providers: [ProjectService],
  exports: [ProjectService],
})
export class ProjectModule {}
