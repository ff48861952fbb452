import {
  Body,
  Controller,
  Get,
  HttpCode,
  Logger,
  Param,
  Post,
  Res,
  UseGuards,
} from '@nestjs/common';
import {
  ApiBearerAuth,
  ApiOperation,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import type { Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { CloudCodeService } from './cloudcode.service';
import { ChatCompletionRequestDto, ModelInfo, ModelsResponse } from './dto';
import { ApiKeyGuard } from '../common/guards';
import { abortOnClose, writeEventStream } from '../common/utils';

@Controller('v1')
@UseGuards(ApiKeyGuard)
@ApiBearerAuth()
export class CloudCodeController {
  private readonly logger = new Logger(CloudCodeController.name);

  constructor(private readonly cloudCodeService: CloudCodeService) {}

  @Post('chat/completions')
  @HttpCode(200)
  @ApiTags('OpenAI Compatible')
  @ApiOperation({
    summary: 'Create chat completion',
    description:
      'Creates a model response for the given chat conversation. Compatible with OpenAI API format.',
  })
  @ApiResponse({ status: 200, description: 'Chat completion response' })
  @ApiResponse({ status: 400, description: 'Invalid request' })
  @ApiResponse({ status: 401, description: 'Unauthorized - invalid API key' })
  async chatCompletions(
    @Body() dto: ChatCompletionRequestDto,
    @Res() res: Response,
  ): Promise<void> {
    const startTime = Date.now();
    res.setHeader('x-request-id', `req_${uuidv4().replace(/-/g, '').slice(0, 24)}`);
    const signal = abortOnClose(res);

    if (dto.stream) {
      const events = await this.cloudCodeService.chatCompletionStream(dto, {
        signal,
      });
      await writeEventStream(res, events, this.logger);
      return;
    }

    const result = await this.cloudCodeService.chatCompletion(dto, { signal });
    res.setHeader('openai-processing-ms', String(Date.now() - startTime));
    res.status(200).json(result);
  }

  @Get('models')
  @ApiTags('Models')
  @ApiOperation({
    summary: 'List available models',
    description: 'Lists the Claude and Gemini models the upstream offers',
  })
  @ApiResponse({ status: 200, description: 'List of available models' })
  listModels(
    @Res({ passthrough: true }) res: Response,
  ): Promise<ModelsResponse> {
    return this.cloudCodeService.listModels({ signal: abortOnClose(res) });
  }

  @Get('models/:id')
  @ApiTags('Models')
  @ApiOperation({ summary: 'Retrieve a model' })
  @ApiResponse({ status: 200, description: 'Model details' })
  @ApiResponse({ status: 404, description: 'Unknown model' })
  getModel(
    @Param('id') id: string,
    @Res({ passthrough: true }) res: Response,
  ): Promise<ModelInfo> {
    return this.cloudCodeService.getModel(id, { signal: abortOnClose(res) });
  }
}
