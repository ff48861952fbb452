import {
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Min,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { CredentialRecord } from '../interfaces';

export class CredentialRecordDto implements CredentialRecord {
  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  access_token!: string;

  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  refresh_token!: string;

  @ApiProperty({ description: 'Expiry as epoch milliseconds' })
  @IsInt()
  @Min(0)
  expiry_date!: number;

  @ApiProperty({ example: 'Bearer' })
  @IsString()
  token_type!: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  scope?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  id_token?: string;
}
