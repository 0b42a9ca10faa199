/**
 * Debug Logging Middleware Tests
 */

import { describe, expect, it } from 'vitest';
import { debugLogger, formatRequest, formatResponse } from '../../framework/middleware/logging.ts';
import { WebRequest } from '../../framework/http/request.ts';
import { MemoryResponder } from '../../framework/http/responder.ts';
import { StringsMap } from '../../framework/http/strings_map.ts';
import { handlerFunc, type Handler } from '../../framework/http/types.ts';
import { Logger, type LogEntry } from '../../framework/telemetry/logger.ts';

function createCapturingLogger() {
  const entries: LogEntry[] = [];
  const logger = new Logger({ level: 'debug', output: (entry) => entries.push(entry) });
  return { logger, entries };
}

const app: Handler = handlerFunc((req) => {
  const body = req.respond(201, StringsMap.headers({ 'Content-Type': 'text/plain' }));
  body.write('created');
  body.end();
});

function createTestRequest(responder: MemoryResponder) {
  return new WebRequest({
    method: 'POST',
    url: '/items?x=1',
    remoteAddr: '127.0.0.1:5000',
    header: { 'Content-Type': 'application/x-www-form-urlencoded', 'Content-Length': '7' },
    param: { x: '1' },
    cookie: { xsrf: 'deadbeef' },
    responder,
  });
}

describe('debugLogger', () => {
  it('returns the handler unchanged when disabled', () => {
    expect(debugLogger(false, app)).toBe(app);
  });

  it('logs the request before the handler and the response when emitted', () => {
    const { logger, entries } = createCapturingLogger();
    const responder = new MemoryResponder();
    let loggedBeforeHandler = 0;
    const observed = handlerFunc((req) => {
      loggedBeforeHandler = entries.length;
      app.serve(req);
    });

    debugLogger(true, observed, logger).serve(createTestRequest(responder));

    expect(loggedBeforeHandler).toBe(1);
    expect(entries.map((e) => e.level)).toEqual(['info', 'info']);
    expect(entries[0]?.message).toBe([
      'REQUEST',
      '  POST HTTP/1.1 /items?x=1',
      '  RemoteAddr: 127.0.0.1:5000',
      '  ContentType: application/x-www-form-urlencoded',
      '  ContentLength: 7',
      '  Header:',
      '    Content-Type: application/x-www-form-urlencoded',
      '    Content-Length: 7',
      '  Param:',
      '    x: 1',
      '  Cookie:',
      '    xsrf: deadbeef',
    ].join('\n'));
    expect(entries[1]?.message).toBe([
      'RESPONSE',
      '  Status: 201',
      '  Header:',
      '    Content-Type: text/plain',
    ].join('\n'));
  });

  it('does not change what is emitted', () => {
    const { logger } = createCapturingLogger();
    const plain = new MemoryResponder();
    const logged = new MemoryResponder();

    app.serve(createTestRequest(plain));
    debugLogger(true, app, logger).serve(createTestRequest(logged));

    expect(logged.status).toBe(plain.status);
    expect(logged.header.toRecord()).toEqual(plain.header.toRecord());
    expect(logged.body).toBe(plain.body);
  });

  it('sees headers added by filters installed further in', () => {
    const { logger, entries } = createCapturingLogger();
    const inner = handlerFunc((req) => {
      req.filterRespond((status, header) => {
        header.append('Set-Cookie', 'xsrf=deadbeef; Path=/; HttpOnly');
        return [status, header];
      });
      app.serve(req);
    });

    debugLogger(true, inner, logger).serve(createTestRequest(new MemoryResponder()));

    expect(entries[1]?.message).toContain('    Set-Cookie: xsrf=deadbeef; Path=/; HttpOnly');
  });

  it('swallows logging failures', () => {
    const logger = new Logger({
      output: () => {
        throw new Error('sink unavailable');
      },
    });
    const responder = new MemoryResponder();

    debugLogger(true, app, logger).serve(createTestRequest(responder));

    expect(responder.status).toBe(201);
    expect(responder.body).toBe('created');
  });
});

describe('formatResponse', () => {
  it('omits the header section when there are no headers', () => {
    expect(formatResponse(204, StringsMap.headers())).toBe('RESPONSE\n  Status: 204');
  });
});

describe('formatRequest', () => {
  it('prints every value of a repeated header', () => {
    const req = new WebRequest({
      url: '/',
      header: { Accept: ['text/html', 'application/json'] },
      responder: new MemoryResponder(),
    });

    expect(formatRequest(req)).toBe([
      'REQUEST',
      '  GET HTTP/1.1 /',
      '  RemoteAddr: ',
      '  ContentType: ',
      '  ContentLength: -1',
      '  Header:',
      '    Accept: text/html',
      '    Accept: application/json',
    ].join('\n'));
  });
});
