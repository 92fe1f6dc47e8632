import OpenAIChatModel from '../OpenAIChatModel';
import { InterpreterConfig } from '../../Config';

const mockCreate = jest.fn();
const mockOpenAIConstructor = jest.fn();

jest.mock('openai', () => {
  return {
    __esModule: true,
    default: class {
      chat = { completions: { create: mockCreate } };
      constructor(opts: { apiKey: string; baseURL?: string; maxRetries?: number }) {
        mockOpenAIConstructor(opts);
      }
    },
  };
});

describe('OpenAIChatModel', () => {
  const baseConfig: InterpreterConfig = {
    provider: 'openrouter',
    api_key: 'test-secret',
    model_name: 'deepseek/deepseek-r1',
    base_url: 'https://openrouter.ai/api/v1',
    temperature: 0,
    max_retries: 2,
    retry_base_delay_ms: 0,
  };
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    jest.clearAllMocks();
    mockCreate.mockResolvedValue({ choices: [{ message: { content: '  {"operation":"unknown"}  ' } }] });
    warnSpy = jest.spyOn(console, 'warn').mockImplementation();
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  it('throws without an API key, naming the provider', () => {
    expect(() => new OpenAIChatModel({ ...baseConfig, api_key: '' })).toThrow('OpenRouter API key is missing in the configuration.');
    expect(() => new OpenAIChatModel({ ...baseConfig, provider: 'openai', api_key: '' })).toThrow('OpenAI API key is missing in the configuration.');
  });

  it('points the client at the configured base URL with SDK retries off', () => {
    new OpenAIChatModel(baseConfig);
    expect(mockOpenAIConstructor).toHaveBeenCalledWith({
      apiKey: 'test-secret',
      baseURL: 'https://openrouter.ai/api/v1',
      maxRetries: 0,
    });
  });

  it('sends the messages and returns the trimmed reply', async () => {
    const model = new OpenAIChatModel(baseConfig);
    const reply = await model.getResponseFromAI([
      { role: 'system', content: 'rules' },
      { role: 'user', content: 'Command: hi' },
    ]);

    expect(reply).toBe('{"operation":"unknown"}');
    expect(mockCreate).toHaveBeenCalledWith({
      model: 'deepseek/deepseek-r1',
      messages: [
        { role: 'system', content: 'rules' },
        { role: 'user', content: 'Command: hi' },
      ],
      temperature: 0,
    });
  });

  it('returns an empty string when the reply has no content', async () => {
    mockCreate.mockResolvedValue({ choices: [] });
    const model = new OpenAIChatModel(baseConfig);
    expect(await model.getResponseFromAI([{ role: 'user', content: 'x' }])).toBe('');
  });

  it('retries rate limits and server errors', async () => {
    mockCreate
      .mockRejectedValueOnce(Object.assign(new Error('slow down'), { status: 429 }))
      .mockRejectedValueOnce(Object.assign(new Error('upstream'), { status: 502 }))
      .mockResolvedValueOnce({ choices: [{ message: { content: 'ok' } }] });
    const model = new OpenAIChatModel(baseConfig);

    expect(await model.getResponseFromAI([{ role: 'user', content: 'x' }])).toBe('ok');
    expect(mockCreate).toHaveBeenCalledTimes(3);
    expect(warnSpy).toHaveBeenCalledTimes(2);
  });

  it('gives up after max_retries', async () => {
    mockCreate.mockRejectedValue(Object.assign(new Error('down'), { status: 503 }));
    const model = new OpenAIChatModel({ ...baseConfig, max_retries: 1 });

    await expect(model.getResponseFromAI([{ role: 'user', content: 'x' }])).rejects.toThrow('down');
    expect(mockCreate).toHaveBeenCalledTimes(2);
  });

  it('does not retry client errors', async () => {
    mockCreate.mockRejectedValue(Object.assign(new Error('bad key'), { status: 401 }));
    const model = new OpenAIChatModel(baseConfig);

    await expect(model.getResponseFromAI([{ role: 'user', content: 'x' }])).rejects.toThrow('bad key');
    expect(mockCreate).toHaveBeenCalledTimes(1);
  });

  it('rejects an empty message list', async () => {
    const model = new OpenAIChatModel(baseConfig);
    await expect(model.getResponseFromAI([])).rejects.toThrow('Cannot get AI response with empty message history.');
  });
});
