import { randomUUID } from 'crypto';
import {
  ProviderResponseError,
  providerErrorFromNetworkError,
  providerErrorFromResponse,
} from '../errors/provider.errors';
import { isRecord } from '../../utils/coerce.util';

/**
 * POST to a provider endpoint and return the decoded JSON body.
 * Every failure leaves as a classified provider error.
 */
export async function postJson(
  provider: string,
  url: string,
  body: string,
  headers: Record<string, string>,
  signal: AbortSignal,
): Promise<unknown> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: 'POST',
      headers: {
        Accept: 'application/json',
        'X-Request-Id': randomUUID(),
        ...headers,
      },
      body,
      signal,
    });
  } catch (error) {
    throw providerErrorFromNetworkError(provider, error);
  }

  if (!response.ok) {
    throw await providerErrorFromResponse(provider, response);
  }

  try {
    return await response.json();
  } catch (error) {
    if (signal.aborted) {
      throw providerErrorFromNetworkError(provider, error);
    }
    throw new ProviderResponseError(
      provider,
      'response body is not valid JSON',
      response.status,
    );
  }
}

/**
 * Text of a chat-completion style body. Accepts the OpenAI shape
 * (choices[0].message.content), a bare string message, or top-level
 * content/text/message fields.
 */
export function extractChatContent(data: unknown): string {
  if (typeof data === 'string') {
    return data;
  }
  if (!isRecord(data)) {
    return '';
  }

  const choices = data.choices;
  if (Array.isArray(choices) && choices.length > 0) {
    const first: unknown = choices[0];
    const message = isRecord(first) ? first.message : undefined;
    if (typeof message === 'string') {
      return message;
    }
    if (isRecord(message) && typeof message.content === 'string') {
      return message.content;
    }
  }

  for (const key of ['content', 'text', 'message']) {
    const value = data[key];
    if (typeof value === 'string' && value) {
      return value;
    }
  }
  return '';
}
