export type LlmConfig = {
  requestTimeoutMs: number;
  backoffBaseMs: number;
  temperature: number;
  gemini: {
    apiKey: string | null;
    model: string;
    baseUrl: string;
  };
  perplexity: {
    apiKey: string | null;
    model: string;
    baseUrl: string;
  };
  gigachat: {
    authKey: string | null;
    scope: string;
    model: string;
    apiBaseUrl: string;
    authUrl: string;
  };
};
