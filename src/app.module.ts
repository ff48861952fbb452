import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CloudCodeModule } from './cloudcode/cloudcode.module';
import { CredentialsModule } from './credentials/credentials.module';
import { HealthModule } from './health/health.module';
import configuration from './config/configuration';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
    }),
    CloudCodeModule,
    CredentialsModule,
    HealthModule,
  ],
})
export class AppModule {}
