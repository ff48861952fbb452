import { NotFoundException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { CloudCodeService } from './cloudcode.service';
import { GeminiNormalizerService } from './services/gemini-normalizer.service';
import { RequestPreparerService } from './services/request-preparer.service';
import { RequestTransformerService } from './services/request-transformer.service';
import { ResponseTransformerService } from './services/response-transformer.service';
import { StreamTransformerService } from './services/stream-transformer.service';
import { TransformerService } from './services/transformer.service';
import { UpstreamClientService } from './services/upstream-client.service';
import { ProjectService } from '../project/project.service';
import { ChatCompletionRequestDto } from './dto';

async function* fromLines(lines: string[]): AsyncGenerator<string> {
  yield* lines;
}

async function collect(events: AsyncIterable<string>): Promise<string[]> {
  const collected: string[] = [];
  for await (const event of events) {
    collected.push(event);
  }
  return collected;
}

const envelope = (response: Record<string, unknown>) =>
  `data: ${JSON.stringify({ traceId: 'trace-1', response })}`;

describe('CloudCodeService', () => {
  let service: CloudCodeService;

  const mockUpstream = {
    call: jest.fn(),
    stream: jest.fn(),
    fetchAvailableModels: jest.fn(),
  };

  const mockProjectService = {
    resolveProjectId: jest.fn(),
  };

  const dto: ChatCompletionRequestDto = {
    model: 'gemini-3-pro',
    messages: [{ role: 'user', content: 'Hello' }],
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    mockProjectService.resolveProjectId.mockResolvedValue('test-project');

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        CloudCodeService,
        GeminiNormalizerService,
        RequestPreparerService,
        RequestTransformerService,
        ResponseTransformerService,
        StreamTransformerService,
        TransformerService,
        { provide: UpstreamClientService, useValue: mockUpstream },
        { provide: ProjectService, useValue: mockProjectService },
        { provide: ConfigService, useValue: { get: jest.fn() } },
      ],
    }).compile();

    service = module.get<CloudCodeService>(CloudCodeService);
  });

  describe('chatCompletion', () => {
    it('should prepare the request and unwrap the response', async () => {
      mockUpstream.call.mockResolvedValue({
        traceId: 'trace-1',
        response: {
          candidates: [
            { content: { parts: [{ text: 'Hi!' }] }, finishReason: 'STOP' },
          ],
        },
      });

      const result = await service.chatCompletion(dto);

      expect(result.id).toMatch(/^chatcmpl-/);
      expect(result.model).toBe('gemini-3-pro');
      expect(result.choices[0].message.content).toBe('Hi!');
      expect(mockUpstream.call).toHaveBeenCalledWith(
        'generateContent',
        expect.objectContaining({
          model: 'gemini-3-pro',
          project: 'test-project',
          userAgent: 'antigravity',
          requestType: 'agent',
        }),
        {},
      );
    });

    it('should pass the signal to project resolution and the upstream', async () => {
      const signal = new AbortController().signal;
      mockUpstream.call.mockResolvedValue({ response: {} });

      await service.chatCompletion(dto, { signal });

      expect(mockProjectService.resolveProjectId).toHaveBeenCalledWith({
        signal,
      });
      expect(mockUpstream.call).toHaveBeenCalledWith(
        'generateContent',
        expect.anything(),
        { signal },
      );
    });

    it('should reject a non-object response', async () => {
      mockUpstream.call.mockResolvedValue('text');

      await expect(service.chatCompletion(dto)).rejects.toThrow(
        'generateContent returned a non-object response',
      );
    });
  });

  describe('chatCompletionStream', () => {
    it('should emit chunks and a done marker', async () => {
      mockUpstream.stream.mockResolvedValue(
        fromLines([
          envelope({ candidates: [{ content: { parts: [{ text: 'Hel' }] } }] }),
          '',
          envelope({
            candidates: [
              { content: { parts: [{ text: 'lo' }] }, finishReason: 'STOP' },
            ],
          }),
          '',
        ]),
      );

      const events = await collect(await service.chatCompletionStream(dto));

      expect(events).toHaveLength(3);
      expect(events[2]).toBe('data: [DONE]\n\n');

      const chunks = events
        .slice(0, 2)
        .map((event) => JSON.parse(event.slice('data: '.length)) as {
          choices: { delta: Record<string, unknown>; finish_reason: string | null }[];
        });
      expect(chunks[0].choices[0].delta).toEqual({
        role: 'assistant',
        content: 'Hel',
      });
      expect(chunks[1].choices[0]).toMatchObject({
        delta: { content: 'lo' },
        finish_reason: 'stop',
      });
      expect(mockUpstream.stream).toHaveBeenCalledWith(
        'streamGenerateContent',
        expect.objectContaining({ model: 'gemini-3-pro' }),
        {},
      );
    });

    it('should add a final chunk when upstream sends no finish reason', async () => {
      mockUpstream.stream.mockResolvedValue(
        fromLines([
          envelope({ candidates: [{ content: { parts: [{ text: 'Hi' }] } }] }),
          'data: not json',
        ]),
      );

      const events = await collect(await service.chatCompletionStream(dto));

      expect(events).toHaveLength(3);
      const final = JSON.parse(events[1].slice('data: '.length)) as {
        choices: { delta: Record<string, unknown>; finish_reason: string }[];
      };
      expect(final.choices[0]).toMatchObject({
        delta: {},
        finish_reason: 'stop',
      });
      expect(events[2]).toBe('data: [DONE]\n\n');
    });
  });

  describe('generateContent', () => {
    it('should normalize the body and return the flat response', async () => {
      mockUpstream.call.mockResolvedValue({
        traceId: 'trace-1',
        response: { candidates: [], modelVersion: 'v1' },
      });

      const result = await service.generateContent('gemini-3-pro', {
        contents: [{ role: 'user', parts: [{ text: 'Hi' }] }],
        generation_config: { max_output_tokens: 64 },
      });

      expect(result).toEqual({
        traceId: 'trace-1',
        candidates: [],
        modelVersion: 'v1',
      });
      expect(mockUpstream.call).toHaveBeenCalledWith(
        'generateContent',
        expect.objectContaining({
          model: 'gemini-3-pro',
          project: 'test-project',
          request: expect.objectContaining({
            contents: [{ role: 'user', parts: [{ text: 'Hi' }] }],
            generationConfig: { maxOutputTokens: 64 },
          }),
        }),
        {},
      );
    });
  });

  describe('streamGenerateContent', () => {
    it('should rewrite every line and keep the framing', async () => {
      mockUpstream.stream.mockResolvedValue(
        fromLines([
          'data: {"response":{"a":1},"traceId":"t"}',
          '',
          ': ping',
        ]),
      );

      const events = await collect(
        await service.streamGenerateContent('gemini-3-pro', { contents: [] }),
      );

      expect(events).toEqual(['data: {"traceId":"t","a":1}\n', '\n', ': ping\n']);
    });
  });

  describe('listModels', () => {
    beforeEach(() => {
      mockUpstream.fetchAvailableModels.mockResolvedValue({
        models: {
          'gemini-3-pro': { displayName: 'Gemini 3 Pro' },
          'llama-70b': { displayName: 'Llama' },
          'claude-sonnet-4-5': {},
        },
      });
    });

    it('should keep claude and gemini models sorted by id', async () => {
      const result = await service.listModels();

      expect(result).toEqual({
        object: 'list',
        data: [
          {
            id: 'claude-sonnet-4-5',
            object: 'model',
            created: expect.any(Number),
            owned_by: 'anthropic',
            display_name: 'claude-sonnet-4-5',
          },
          {
            id: 'gemini-3-pro',
            object: 'model',
            created: expect.any(Number),
            owned_by: 'google',
            display_name: 'Gemini 3 Pro',
          },
        ],
      });
    });

    it('should find a single model', async () => {
      await expect(service.getModel('gemini-3-pro')).resolves.toMatchObject({
        id: 'gemini-3-pro',
      });
    });

    it('should reject models that are filtered out', async () => {
      await expect(service.getModel('llama-70b')).rejects.toThrow(
        NotFoundException,
      );
    });
  });
});
