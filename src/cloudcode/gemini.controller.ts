import {
  Body,
  Controller,
  HttpCode,
  Logger,
  NotFoundException,
  Post,
  Req,
  Res,
  UseGuards,
} from '@nestjs/common';
import {
  ApiBearerAuth,
  ApiHeader,
  ApiOperation,
  ApiParam,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import type { Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { CloudCodeService } from './cloudcode.service';
import { ApiKeyGuard } from '../common/guards';
import {
  abortOnClose,
  isGeminiAction,
  parseGeminiPath,
  writeEventStream,
} from '../common/utils';

@Controller()
@UseGuards(ApiKeyGuard)
@ApiBearerAuth()
@ApiTags('Gemini Compatible')
export class GeminiController {
  private readonly logger = new Logger(GeminiController.name);

  constructor(private readonly cloudCodeService: CloudCodeService) {}

  @Post(['v1beta/models/:target', 'v1/models/:target'])
  @HttpCode(200)
  @ApiOperation({
    summary: 'Generate content',
    description:
      'Gemini API style generation. The target is `{model}:generateContent` or `{model}:streamGenerateContent`.',
  })
  @ApiParam({ name: 'target', example: 'gemini-3-pro:generateContent' })
  @ApiHeader({
    name: 'x-goog-api-key',
    required: false,
    description: 'API key (alternative to Bearer token)',
  })
  @ApiResponse({ status: 200, description: 'Generation response' })
  @ApiResponse({ status: 404, description: 'Unknown action' })
  async generate(
    @Req() req: Request,
    @Body() body: unknown,
    @Res() res: Response,
  ): Promise<void> {
    const target = parseGeminiPath(req.path);
    if (!target || !isGeminiAction(target.action)) {
      throw new NotFoundException(
        `Unsupported action '${target?.action ?? req.path}'`,
      );
    }

    res.setHeader('x-request-id', `req_${uuidv4().replace(/-/g, '').slice(0, 24)}`);
    const signal = abortOnClose(res);

    if (target.action === 'streamGenerateContent') {
      const events = await this.cloudCodeService.streamGenerateContent(
        target.model,
        body,
        { signal },
      );
      await writeEventStream(res, events, this.logger);
      return;
    }

    const result = await this.cloudCodeService.generateContent(
      target.model,
      body,
      { signal },
    );
    res.status(200).json(result);
  }
}
