import { describe, it, expect } from 'vitest';
import { buildUpstreamUrl } from '../../src/application/index.js';

describe('buildUpstreamUrl', () => {
  it('appends the request path and query to a bare origin', () => {
    expect(buildUpstreamUrl(new URL('http://monolith:8080'), '/api/movies/1?sort=asc'))
      .toBe('http://monolith:8080/api/movies/1?sort=asc');
  });

  it('keeps the root path', () => {
    expect(buildUpstreamUrl(new URL('http://monolith:8080'), '/')).toBe('http://monolith:8080/');
  });

  it('joins a base path with a trailing slash without doubling it', () => {
    expect(buildUpstreamUrl(new URL('http://movies:8081/v2/'), '/api/movies'))
      .toBe('http://movies:8081/v2/api/movies');
  });

  it('joins a base path without a trailing slash', () => {
    expect(buildUpstreamUrl(new URL('http://movies:8081/v2'), '/api/movies'))
      .toBe('http://movies:8081/v2/api/movies');
  });

  it('concatenates base and request queries', () => {
    expect(buildUpstreamUrl(new URL('http://events:8082/?tenant=a'), '/api/events/user?debug=1'))
      .toBe('http://events:8082/api/events/user?tenant=a&debug=1');
  });

  it('keeps the base query when the request has none', () => {
    expect(buildUpstreamUrl(new URL('http://events:8082/?tenant=a'), '/api/events'))
      .toBe('http://events:8082/api/events?tenant=a');
  });
});
