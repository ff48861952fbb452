import { NotFoundException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import type { Request, Response } from 'express';
import { GeminiController } from './gemini.controller';
import { CloudCodeService } from './cloudcode.service';
import { ApiKeyGuard } from '../common/guards/api-key.guard';

async function* fromEvents(events: string[]): AsyncGenerator<string> {
  yield* events;
}

describe('GeminiController', () => {
  let controller: GeminiController;

  const mockCloudCodeService = {
    generateContent: jest.fn(),
    streamGenerateContent: jest.fn(),
  };

  const createMockResponse = () => {
    const written: string[] = [];
    const res = {
      writableEnded: false,
      writableFinished: false,
      destroyed: false,
      on: jest.fn(),
      setHeader: jest.fn(),
      flushHeaders: jest.fn(),
      status: jest.fn(),
      json: jest.fn(),
      write: jest.fn((chunk: string) => written.push(chunk) > 0),
      end: jest.fn(),
    };
    res.status.mockReturnValue(res);
    res.end.mockImplementation(() => {
      res.writableEnded = true;
    });
    return { res, response: res as unknown as Response, written };
  };

  const request = (path: string) => ({ path }) as unknown as Request;

  const body = { contents: [{ role: 'user', parts: [{ text: 'Hi' }] }] };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [GeminiController],
      providers: [
        { provide: CloudCodeService, useValue: mockCloudCodeService },
      ],
    })
      .overrideGuard(ApiKeyGuard)
      .useValue({ canActivate: jest.fn(() => true) })
      .compile();

    controller = module.get<GeminiController>(GeminiController);

    jest.clearAllMocks();
  });

  it('should answer generateContent with JSON', async () => {
    const { res, response } = createMockResponse();
    mockCloudCodeService.generateContent.mockResolvedValue({ candidates: [] });

    await controller.generate(
      request('/v1beta/models/gemini-3-pro:generateContent'),
      body,
      response,
    );

    expect(mockCloudCodeService.generateContent).toHaveBeenCalledWith(
      'gemini-3-pro',
      body,
      { signal: expect.any(AbortSignal) },
    );
    expect(res.status).toHaveBeenCalledWith(200);
    expect(res.json).toHaveBeenCalledWith({ candidates: [] });
  });

  it('should stream streamGenerateContent as SSE', async () => {
    const { res, response, written } = createMockResponse();
    mockCloudCodeService.streamGenerateContent.mockResolvedValue(
      fromEvents(['data: {"candidates":[]}\n', '\n']),
    );

    await controller.generate(
      request('/v1/models/claude-sonnet-4-5:streamGenerateContent'),
      body,
      response,
    );

    expect(mockCloudCodeService.streamGenerateContent).toHaveBeenCalledWith(
      'claude-sonnet-4-5',
      body,
      { signal: expect.any(AbortSignal) },
    );
    expect(res.setHeader).toHaveBeenCalledWith(
      'Content-Type',
      'text/event-stream',
    );
    expect(written).toEqual(['data: {"candidates":[]}\n', '\n']);
    expect(res.end).toHaveBeenCalledTimes(1);
  });

  it('should reject unsupported actions', async () => {
    const { response } = createMockResponse();

    await expect(
      controller.generate(
        request('/v1beta/models/gemini-3-pro:countTokens'),
        body,
        response,
      ),
    ).rejects.toThrow(NotFoundException);
    expect(mockCloudCodeService.generateContent).not.toHaveBeenCalled();
  });
});
