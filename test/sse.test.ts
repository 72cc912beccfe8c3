import { describe, expect, it } from 'vitest';

import { parseSseFrames } from '../src/cli/sse.js';

describe('parseSseFrames', () => {
  it('splits complete frames and keeps the partial tail', () => {
    const { frames, rest } = parseSseFrames('event: snapshot\nid: 0\ndata: {"a":1}\n\nid: 1\ndata: {"b":2}\n\nid: 2\ndata: {"c"');

    expect(frames).toEqual([
      { event: 'snapshot', id: '0', data: '{"a":1}' },
      { event: 'message', id: '1', data: '{"b":2}' },
    ]);
    expect(rest).toBe('id: 2\ndata: {"c"');
  });

  it('joins multi-line data and skips comments and empty frames', () => {
    const { frames, rest } = parseSseFrames(': keepalive\n\r\nevent: overflow\r\ndata: first\r\ndata:second\r\n\r\n');

    expect(frames).toEqual([{ event: 'overflow', id: undefined, data: 'first\nsecond' }]);
    expect(rest).toBe('');
  });
});
