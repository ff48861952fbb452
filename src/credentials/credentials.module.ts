import { Module } from '@nestjs/common';
import { CredentialsController } from './credentials.controller';
import { FileCredentialsService } from './file-credentials.service';
import { CREDENTIALS_PROVIDER } from './interfaces';

@Module({
  controllers: [CredentialsController],
  providers: [
    FileCredentialsService,
    { provide: CREDENTIALS_PROVIDER, useExisting: FileCredentialsService },
  ],
  exports: [CREDENTIALS_PROVIDER],
})
export class CredentialsModule {}
