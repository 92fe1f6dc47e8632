import GeminiModel from '../GeminiModel';
import { InterpreterConfig } from '../../Config';

const mockGenerateContent = jest.fn();
const mockGetGenerativeModel = jest.fn(() => ({ generateContent: mockGenerateContent }));

jest.mock('@google/generative-ai', () => ({
  __esModule: true,
  FinishReason: { STOP: 'STOP', MAX_TOKENS: 'MAX_TOKENS', SAFETY: 'SAFETY' },
  GoogleGenerativeAI: class {
    getGenerativeModel = mockGetGenerativeModel;
  },
}));

function reply(text: string, finishReason = 'STOP') {
  return {
    response: {
      candidates: [{ finishReason }],
      text: () => text,
    },
  };
}

describe('GeminiModel', () => {
  const config: InterpreterConfig = {
    provider: 'gemini',
    api_key: 'test-secret',
    model_name: 'gemini-2.0-flash',
    temperature: 0,
    max_retries: 0,
    retry_base_delay_ms: 0,
  };

  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('throws without an API key', () => {
    expect(() => new GeminiModel({ ...config, api_key: '' })).toThrow('Gemini API key is missing in the configuration.');
  });

  it('passes system text as the system instruction and merges same-role turns', async () => {
    mockGenerateContent.mockResolvedValue(reply(' {"operation":"unknown"} '));
    const model = new GeminiModel(config);

    const text = await model.getResponseFromAI([
      { role: 'system', content: 'rules' },
      { role: 'user', content: 'first' },
      { role: 'user', content: 'second' },
      { role: 'assistant', content: 'answer' },
    ]);

    expect(text).toBe('{"operation":"unknown"}');
    expect(mockGetGenerativeModel).toHaveBeenCalledWith({ model: 'gemini-2.0-flash', systemInstruction: 'rules' });
    expect(mockGenerateContent).toHaveBeenCalledWith({
      contents: [
        { role: 'user', parts: [{ text: 'first' }, { text: 'second' }] },
        { role: 'model', parts: [{ text: 'answer' }] },
      ],
      generationConfig: { temperature: 0 },
    });
  });

  it('throws when generation is blocked', async () => {
    mockGenerateContent.mockResolvedValue(reply('', 'SAFETY'));
    const model = new GeminiModel(config);
    await expect(model.getResponseFromAI([{ role: 'user', content: 'x' }]))
      .rejects.toThrow('Model gemini-2.0-flash generation blocked. Reason: SAFETY.');
  });
});
