import http from 'http';
import type { ZodType, ZodTypeDef } from 'zod';
import { DecodingError, EncodingError, NetworkError, describeCause } from '../../common/errors/app-error';

export interface SignedJsonRequest<T> {
  url: string;
  body: unknown;
  authorization: string;
  timeoutMs: number;
  schema: ZodType<T, ZodTypeDef, unknown>;
}

export interface SignedJsonResponse<T> {
  statusCode: number;
  data: T;
}

export const DEFAULT_TIMEOUT_MS = 5000;

export function buildInterfaceUrl(host: string, operation: string): string {
  return `http://${host}/youtu/api/${operation}`;
}

export async function postSignedJson<T>(options: SignedJsonRequest<T>): Promise<SignedJsonResponse<T>> {
  const payload = serializeBody(options.body);
  const timeoutMs = Number.isFinite(options.timeoutMs) && options.timeoutMs > 0
    ? options.timeoutMs
    : DEFAULT_TIMEOUT_MS;

  const { statusCode, rawBody } = await sendRequest(options.url, payload, options.authorization, timeoutMs);
  return {
    statusCode,
    data: decodeBody(rawBody, options.schema),
  };
}

function serializeBody(body: unknown): string {
  let serialized: string | undefined;
  try {
    serialized = JSON.stringify(body);
  } catch (error) {
    throw new EncodingError('Failed to serialize request body', describeCause(error));
  }

  if (serialized === undefined) {
    throw new EncodingError('Request body is not representable as JSON');
  }
  return serialized;
}

function sendRequest(
  url: string,
  payload: string,
  authorization: string,
  timeoutMs: number,
): Promise<{ statusCode: number; rawBody: string }> {
  return new Promise((resolve, reject) => {
    const body = Buffer.from(payload, 'utf8');
    let settled = false;
    let req: http.ClientRequest | undefined;
    let timeoutId: NodeJS.Timeout | undefined;

    const fail = (message: string, error?: unknown): void => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timeoutId);
      req?.destroy();
      reject(new NetworkError(message, error === undefined ? { url } : { url, ...describeCause(error) }));
    };

    try {
      req = http.request(url, {
        method: 'POST',
        agent: false,
        headers: {
          Authorization: authorization,
          'Content-Type': 'text/json',
          Accept: '*/*',
          'User-Agent': '',
          Expect: '100-continue',
          'Content-Length': body.length,
        },
      });
    } catch (error) {
      fail(`Invalid request to ${url}`, error);
      return;
    }

    // Covers connect, upload and the full body read.
    timeoutId = setTimeout(() => {
      fail(`Request timed out after ${timeoutMs}ms`);
    }, timeoutMs);

    req.on('error', (error) => {
      fail(`Request to ${url} failed: ${error.message}`, error);
    });

    req.on('response', (res) => {
      const chunks: Buffer[] = [];

      res.on('data', (chunk: Buffer) => {
        chunks.push(chunk);
      });
      res.on('error', (error) => {
        fail(`Failed to read response body: ${error.message}`, error);
      });
      res.on('aborted', () => {
        fail('Response body was cut off before completion');
      });
      res.on('end', () => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timeoutId);
        resolve({
          statusCode: res.statusCode ?? 0,
          rawBody: Buffer.concat(chunks).toString('utf8'),
        });
      });
    });

    req.end(body);
  });
}

function decodeBody<T>(rawBody: string, schema: ZodType<T, ZodTypeDef, unknown>): T {
  let parsed: unknown;
  try {
    parsed = JSON.parse(rawBody);
  } catch (error) {
    const reason = error instanceof Error ? error.message : 'Unknown JSON parse error';
    throw new DecodingError(`Failed to parse response JSON: ${reason}`, rawBody, error);
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new DecodingError('Response does not match the expected shape', rawBody, result.error);
  }
  return result.data;
}
