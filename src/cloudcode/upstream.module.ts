import { Module } from '@nestjs/common';
import { CredentialsModule } from '../credentials/credentials.module';
import { UpstreamClientService } from './services/upstream-client.service';

@Module({
  imports: [CredentialsModule],
  providers: [UpstreamClientService],
  exports: [UpstreamClientService],
})
export class UpstreamModule {}
