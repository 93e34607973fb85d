import { describe, it, expect } from 'vitest';
import { bodyLimit } from '../../src/middleware/body-limit.js';
import { PayloadTooLargeError } from '../../src/errors.js';
import type { Handler, HandlerContext } from '../../src/middleware/pipeline.js';

describe('bodyLimit', () => {
  const ctx: HandlerContext = { requestId: 'req-1' };

  const echoHandler: Handler = async (req) => new Response(await req.text(), { status: 200 });

  function streamOf(...parts: string[]): ReadableStream<Uint8Array> {
    const encoder = new TextEncoder();
    return new ReadableStream({
      start(controller) {
        for (const part of parts) controller.enqueue(encoder.encode(part));
        controller.close();
      },
    });
  }

  it('should pass a body within the limit through intact', async () => {
    const req = new Request('http://test/api/v1/analyze', { method: 'POST', body: 'hello' });
    const res = await bodyLimit(10)(echoHandler)(req, ctx);

    expect(res.status).toBe(200);
    expect(await res.text()).toBe('hello');
  });

  it('should skip requests without a body', async () => {
    const res = await bodyLimit(1)(async () => new Response('ok'))(new Request('http://test'), ctx);
    expect(await res.text()).toBe('ok');
  });

  it('should reject a declared Content-Length above the limit', async () => {
    const req = new Request('http://test', {
      method: 'POST',
      headers: { 'Content-Length': '11' },
      body: 'hello world',
    });

    await expect(bodyLimit(10)(echoHandler)(req, ctx)).rejects.toThrow(PayloadTooLargeError);
  });

  it('should count streamed bytes when no length is declared', async () => {
    const req = new Request('http://test', {
      method: 'POST',
      body: streamOf('12345', '67890', 'x'),
      duplex: 'half',
    });

    await expect(bodyLimit(10)(echoHandler)(req, ctx)).rejects.toThrow('Request body exceeds 10 bytes');
  });
});
