// Fake transport for unit tests: records every request, answers from a queue.

import type {
  HttpHeaders,
  HttpTransport,
  TransportRequest,
  TransportResponse,
} from '../../types/index.js';

export type FakeReply =
  | { status: number; statusText?: string; headers?: HttpHeaders; body?: string | object }
  | Error;

export class RecordingTransport implements HttpTransport {
  readonly sent: TransportRequest[] = [];
  disposeCount = 0;
  private readonly replies: FakeReply[];

  constructor(...replies: FakeReply[]) {
    this.replies = replies;
  }

  get disposed(): boolean {
    return this.disposeCount > 0;
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    this.sent.push(request);
    const reply = this.replies.shift() ?? { status: 200, body: '' };
    if (reply instanceof Error) throw reply;

    const body = typeof reply.body === 'string' || reply.body === undefined
      ? reply.body ?? ''
      : JSON.stringify(reply.body);
    return {
      url: request.url,
      status: reply.status,
      statusText: reply.statusText ?? '',
      headers: reply.headers ?? {},
      body: Buffer.from(body, 'utf-8'),
    };
  }

  async dispose(): Promise<void> {
    this.disposeCount += 1;
  }
}
