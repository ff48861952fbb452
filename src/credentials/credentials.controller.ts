import { Body, Controller, Get, Put, UseGuards } from '@nestjs/common';
import {
  ApiBearerAuth,
  ApiHeader,
  ApiOperation,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import { AdminKeyGuard } from '../common/guards';
import { CredentialRecordDto } from './dto/credential-record.dto';
import { FileCredentialsService } from './file-credentials.service';
import { CredentialsStatus } from './interfaces';

@Controller('admin/credentials')
@UseGuards(AdminKeyGuard)
@ApiTags('Admin')
@ApiBearerAuth()
@ApiHeader({
  name: 'x-admin-key',
  required: false,
  description: 'Admin key (alternative to Bearer token)',
})
export class CredentialsController {
  constructor(private readonly credentialsService: FileCredentialsService) {}

  @Get()
  @ApiOperation({ summary: 'Show whether credentials are stored and when they expire' })
  @ApiResponse({ status: 200, description: 'Credential status' })
  @ApiResponse({ status: 403, description: 'Admin API disabled' })
  getStatus(): CredentialsStatus {
    return this.credentialsService.getStatus();
  }

  @Put()
  @ApiOperation({ summary: 'Replace the stored credentials' })
  @ApiResponse({ status: 200, description: 'Credential status after the update' })
  @ApiResponse({ status: 400, description: 'Invalid credential record' })
  async update(@Body() dto: CredentialRecordDto): Promise<CredentialsStatus> {
    return this.credentialsService.save(dto);
  }
}
