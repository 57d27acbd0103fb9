/**
 * Request / Response Wrapper Tests
 */

import http from 'http';
import net from 'net';
import { createRequest, parseQueryString } from '../request-response';

function incoming(url: string, headers: http.IncomingHttpHeaders = {}): http.IncomingMessage {
  const message = new http.IncomingMessage(new net.Socket());
  message.method = 'get';
  message.url = url;
  message.headers = headers;
  return message;
}

describe('parseQueryString', () => {
  it('should decode pairs and keep the last value of repeated keys', () => {
    expect(parseQueryString('a=1&b=two%20words&a=3')).toEqual({ a: '3', b: 'two words' });
  });

  it('should return an empty object for an empty string', () => {
    expect(parseQueryString('')).toEqual({});
  });
});

describe('Request', () => {
  it('should split the target into path and query without resolving it', () => {
    const req = createRequest(incoming('/a/../b//c?x=1&y=2'));

    expect(req.method).toBe('GET');
    expect(req.path).toBe('/a/../b//c');
    expect(req.search).toBe('?x=1&y=2');
    expect(req.query).toEqual({ x: '1', y: '2' });
  });

  it('should treat a bare question mark as no query', () => {
    const req = createRequest(incoming('/page?'));

    expect(req.path).toBe('/page');
    expect(req.search).toBe('');
  });

  it('should keep a path that starts with two slashes as a path', () => {
    expect(createRequest(incoming('//evil.example/x')).path).toBe('//evil.example/x');
  });

  it('should read headers case-insensitively', () => {
    const req = createRequest(incoming('/', { 'x-token': 'test-secret', 'x-list': ['first', 'second'] }));

    expect(req.getHeader('X-Token')).toBe('test-secret');
    expect(req.getHeader('X-List')).toBe('first');
    expect(req.getHeader('missing')).toBeUndefined();
  });
});
