import { describe, expect, it } from 'vitest';
import { RouteHandler, RouteTable } from './RouteTable';

const handler = (): RouteHandler => async () => undefined;

describe('RouteTable', () => {
  it('prefers an exact match over an earlier prefix', () => {
    const root = handler();
    const uploads = handler();
    const table = new RouteTable().get('/', root).get('/upload/', uploads);

    expect(table.match('GET', '/upload/')).toEqual({ kind: 'exact', path: '/upload/', handler: uploads });
  });

  it('falls back to the first registered prefix', () => {
    const first = handler();
    const second = handler();
    const table = new RouteTable().delete('/upload/', first).delete('/upload/images/', second);

    expect(table.match('DELETE', '/upload/images/cat.png')).toEqual({
      kind: 'prefix',
      path: '/upload/',
      handler: first,
    });
  });

  it('sends unmatched GET paths to the root route through the prefix rule', () => {
    const root = handler();
    const table = new RouteTable().get('/', root).get('/upload/', handler());

    expect(table.match('GET', '/anything')).toEqual({ kind: 'prefix', path: '/', handler: root });
  });

  it('keeps methods apart', () => {
    const upload = handler();
    const table = new RouteTable().post('/upload/', upload);

    expect(table.match('POST', '/upload/')?.handler).toBe(upload);
    expect(table.match('GET', '/upload/')).toBeNull();
    expect(table.match('DELETE', '/upload/cat.png')).toBeNull();
  });

  it('never matches a method it has no table for', () => {
    const table = new RouteTable().get('/', handler());

    expect(table.match('PUT', '/')).toBeNull();
    expect(table.match('HEAD', '/')).toBeNull();
  });

  it('returns null when no path matches', () => {
    const table = new RouteTable().post('/upload/', handler());

    expect(table.match('POST', '/elsewhere')).toBeNull();
    expect(table.match('POST', '/upload')).toBeNull();
  });
});
