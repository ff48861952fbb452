import { BadRequestException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import {
  GeminiNormalizerService,
  pickField,
  sanitizeToolName,
} from './gemini-normalizer.service';

describe('GeminiNormalizerService', () => {
  let service: GeminiNormalizerService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [GeminiNormalizerService],
    }).compile();

    service = module.get<GeminiNormalizerService>(GeminiNormalizerService);
  });

  describe('normalizeRequest', () => {
    it('should read contents and coerce roles', () => {
      const result = service.normalizeRequest({
        contents: [
          { role: 'user', parts: [{ text: 'Hi' }] },
          { role: 'MODEL', parts: [{ text: 'Hello', thought: true }] },
          { role: 'function', parts: [{}] },
        ],
      });

      expect(result).toEqual({
        contents: [
          { role: 'user', parts: [{ text: 'Hi' }] },
          { role: 'model', parts: [{ text: 'Hello', thought: true }] },
          { role: 'user', parts: [{ text: '' }] },
        ],
      });
    });

    it('should accept snake_case aliases', () => {
      const result = service.normalizeRequest({
        contents: [
          {
            role: 'model',
            parts: [
              {
                function_call: { id: 'c1', name: 'lookup', args: { q: 'x' } },
                thought_signature: 'sig',
              },
            ],
          },
          {
            role: 'user',
            parts: [
              {
                function_response: {
                  name: 'lookup',
                  response: { output: 'y' },
                },
              },
            ],
          },
        ],
        system_instruction: { parts: [{ text: 'Be terse' }, { inline: 1 }] },
        generation_config: {
          temperature: 0.2,
          top_p: 0.8,
          top_k: 40,
          max_output_tokens: 1024,
          stop_sequences: ['STOP', 7],
          thinking_config: {
            include_thoughts: true,
            thinking_budget: 2048,
          },
        },
        session_id: 'session-1',
      });

      expect(result).toEqual({
        contents: [
          {
            role: 'model',
            parts: [
              {
                thoughtSignature: 'sig',
                functionCall: { id: 'c1', name: 'lookup', args: { q: 'x' } },
              },
            ],
          },
          {
            role: 'user',
            parts: [
              {
                functionResponse: { name: 'lookup', response: { output: 'y' } },
              },
            ],
          },
        ],
        systemInstruction: { role: 'user', parts: [{ text: 'Be terse' }] },
        generationConfig: {
          temperature: 0.2,
          topP: 0.8,
          topK: 40,
          maxOutputTokens: 1024,
          stopSequences: ['STOP'],
          thinkingConfig: { includeThoughts: true, thinkingBudget: 2048 },
        },
        sessionId: 'session-1',
      });
    });

    it('should accept a string system instruction', () => {
      const result = service.normalizeRequest({
        contents: [],
        systemInstruction: 'You are helpful',
      });

      expect(result.systemInstruction).toEqual({
        role: 'user',
        parts: [{ text: 'You are helpful' }],
      });
    });

    it('should normalize the tool config mode', () => {
      const result = service.normalizeRequest({
        contents: [],
        toolConfig: {
          functionCallingConfig: { mode: 'any', allowedFunctionNames: ['f'] },
        },
      });

      expect(result.toolConfig).toEqual({
        functionCallingConfig: { mode: 'ANY', allowedFunctionNames: ['f'] },
      });
    });

    it('should read the tool config from snake_case keys', () => {
      const result = service.normalizeRequest({
        contents: [],
        tool_config: {
          function_calling_config: {
            mode: 'none',
            allowed_function_names: ['lookup', 7],
          },
        },
      });

      expect(result.toolConfig).toEqual({
        functionCallingConfig: { mode: 'NONE', allowedFunctionNames: ['lookup'] },
      });
    });

    it('should drop an unknown tool config mode', () => {
      const result = service.normalizeRequest({
        contents: [],
        toolConfig: { functionCallingConfig: { mode: 'sometimes' } },
      });

      expect(result.toolConfig).toBeUndefined();
    });

    it('should reject bodies that are not objects', () => {
      expect(() => service.normalizeRequest('text')).toThrow(
        BadRequestException,
      );
      expect(() => service.normalizeRequest({ contents: 'nope' })).toThrow(
        'contents must be an array',
      );
    });
  });

  describe('normalizeTools', () => {
    it('should read declarations from a single tool object', () => {
      expect(
        service.normalizeTools({
          function_declarations: [
            {
              name: 'get_time',
              description: 'Current time',
              parametersJsonSchema: {
                type: 'object',
                properties: { zone: { type: 'string' } },
              },
            },
          ],
        }),
      ).toEqual([
        {
          functionDeclarations: [
            {
              name: 'get_time',
              description: 'Current time',
              parameters: {
                type: 'OBJECT',
                properties: { zone: { type: 'STRING' } },
              },
            },
          ],
        },
      ]);
    });

    it('should convert raw tool definitions and sanitize their names', () => {
      expect(
        service.normalizeTools([
          {
            name: 'read file',
            description: 'Reads a file',
            input_schema: {
              type: 'object',
              properties: { path: { type: 'string' } },
              required: ['path'],
            },
          },
          { custom: { name: 'web.search' } },
          { function: { name: 'list', parameters: { type: 'object' } } },
          { description: 'no name' },
        ]),
      ).toEqual([
        {
          functionDeclarations: [
            {
              name: 'read_file',
              description: 'Reads a file',
              parameters: {
                type: 'OBJECT',
                properties: { path: { type: 'STRING' } },
                required: ['path'],
              },
            },
            { name: 'web_search', parameters: { type: 'OBJECT' } },
            { name: 'list', parameters: { type: 'OBJECT' } },
          ],
        },
      ]);
    });

    it('should return undefined for absent or empty tools', () => {
      expect(service.normalizeTools(undefined)).toBeUndefined();
      expect(service.normalizeTools([])).toBeUndefined();
    });
  });
});

describe('sanitizeToolName', () => {
  it('should replace unsupported characters and cap the length', () => {
    expect(sanitizeToolName(' mcp:fs/read ')).toBe('mcp_fs_read');
    expect(sanitizeToolName('a'.repeat(70))).toHaveLength(64);
  });
});

describe('pickField', () => {
  it('should prefer the first spelling that is set', () => {
    expect(pickField({ topP: 0.5, top_p: 0.9 }, 'topP')).toBe(0.5);
    expect(pickField({ topP: null, top_p: 0.9 }, 'topP')).toBe(0.9);
    expect(pickField({}, 'topP')).toBeUndefined();
  });
});
