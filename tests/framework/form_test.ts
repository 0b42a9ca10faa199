/**
 * Form Middleware Tests
 */

import { describe, expect, it, vi } from 'vitest';
import { formGate, parseUrlEncoded, processForm } from '../../framework/middleware/form.ts';
import { WebRequest, type WebRequestInit } from '../../framework/http/request.ts';
import { MemoryResponder } from '../../framework/http/responder.ts';
import { RequestError } from '../../framework/http/errors.ts';
import { handlerFunc } from '../../framework/http/types.ts';

function createTestRequest(init: Partial<WebRequestInit> = {}) {
  const errors: Array<{ status: number; reason: Error }> = [];
  const responder = new MemoryResponder();
  const req = new WebRequest({
    responder,
    errorHandler: (_req, status, reason) => {
      errors.push({ status, reason });
    },
    ...init,
  });
  return { req, errors, responder };
}

describe('formGate', () => {
  it('rejects a body over the limit with 413', () => {
    const next = vi.fn();
    const { req, errors } = createTestRequest({ method: 'POST', header: { 'Content-Length': '11' } });

    formGate(10, handlerFunc(next)).serve(req);

    expect(next).not.toHaveBeenCalled();
    expect(errors.map((e) => e.status)).toEqual([413]);
    expect(errors[0]?.reason).toBeInstanceOf(RequestError);
  });

  it('rejects with 417 when the client sent Expect', () => {
    const next = vi.fn();
    const { req, errors } = createTestRequest({
      method: 'POST',
      header: { 'Content-Length': '11', Expect: '100-continue' },
    });

    formGate(10, handlerFunc(next)).serve(req);

    expect(next).not.toHaveBeenCalled();
    expect(errors.map((e) => e.status)).toEqual([417]);
  });

  it('delegates when the length equals the limit', () => {
    const next = vi.fn();
    const { req, errors } = createTestRequest({ method: 'POST', header: { 'Content-Length': '10' } });

    formGate(10, handlerFunc(next)).serve(req);

    expect(next).toHaveBeenCalledWith(req);
    expect(errors).toEqual([]);
  });

  it('delegates when the length is unknown', () => {
    const next = vi.fn();
    const { req } = createTestRequest();

    formGate(0, handlerFunc(next)).serve(req);

    expect(next).toHaveBeenCalledOnce();
  });

  it('parses the query string and a URL-encoded body before next runs', () => {
    let seen: Record<string, string[]> = {};
    const { req } = createTestRequest({
      method: 'POST',
      url: '/submit?a=1&b=x+y',
      header: { 'Content-Type': 'application/x-www-form-urlencoded; charset=utf-8' },
      body: 'a=2&c=%C3%A9&flag',
    });

    formGate(1024, handlerFunc((r) => {
      seen = r.param.toRecord();
    })).serve(req);

    expect(seen).toEqual({ a: ['1', '2'], b: ['x y'], c: ['é'], flag: [''] });
  });

  it('leaves the body of other content types unparsed', () => {
    const { req } = createTestRequest({
      method: 'POST',
      url: '/api',
      header: { 'Content-Type': 'application/json' },
      body: 'a=1',
    });

    formGate(1024, handlerFunc(() => {})).serve(req);

    expect(req.param.size).toBe(0);
  });

  it('rejects a malformed escape with 400 and keeps the parameters untouched', () => {
    const next = vi.fn();
    const { req, errors } = createTestRequest({
      method: 'POST',
      url: '/submit?ok=1',
      param: { keep: 'yes' },
      header: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: 'a=%zz',
    });

    formGate(1024, handlerFunc(next)).serve(req);

    expect(next).not.toHaveBeenCalled();
    expect(errors.map((e) => e.status)).toEqual([400]);
    expect(req.param.toRecord()).toEqual({ keep: ['yes'] });
  });

  it('rejects a body that is not UTF-8 with 400', () => {
    const { req, errors } = createTestRequest({
      method: 'POST',
      header: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: new Uint8Array([0x61, 0x3d, 0xff]),
    });

    formGate(1024, handlerFunc(() => {})).serve(req);

    expect(errors.map((e) => e.status)).toEqual([400]);
    expect(errors[0]?.reason).toMatchObject({ code: 'MALFORMED_FORM' });
    expect(req.param.size).toBe(0);
  });

  it('rejects a malformed query string with 400', () => {
    const { req, errors } = createTestRequest({ url: '/search?q=100%' });

    formGate(1024, handlerFunc(() => {})).serve(req);

    expect(errors.map((e) => e.status)).toEqual([400]);
  });
});

describe('parseUrlEncoded', () => {
  it('skips empty segments', () => {
    expect(parseUrlEncoded('a=1&&b=2&').toRecord()).toEqual({ a: ['1'], b: ['2'] });
  });

  it('keeps "=" inside values', () => {
    expect(parseUrlEncoded('expr=a%3Db=c').toRecord()).toEqual({ expr: ['a=b=c'] });
  });
});

describe('processForm', () => {
  it('checks the body limit before the XSRF token', () => {
    const responder = new MemoryResponder();
    const req = new WebRequest({
      method: 'POST',
      header: { 'Content-Length': '20' },
      responder,
    });

    processForm(10, true, handlerFunc(() => {})).serve(req);

    expect(responder.status).toBe(413);
    expect(responder.header.has('Set-Cookie')).toBe(false);
  });

  it('accepts a POST whose form token matches the cookie', () => {
    const responder = new MemoryResponder();
    const req = new WebRequest({
      method: 'POST',
      cookie: { xsrf: 'deadbeef' },
      header: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: 'xsrf=deadbeef',
      responder,
    });
    const next = vi.fn();

    processForm(1024, true, handlerFunc(next)).serve(req);

    expect(next).toHaveBeenCalledOnce();
    expect(responder.responded).toBe(false);
  });
});
