import { describe, it, expect } from 'vitest';
import { parsePostForm } from './form.js';

const FORM = { 'content-type': 'application/x-www-form-urlencoded' };

describe('parsePostForm', () => {
  it('parses url-encoded bodies and leaves them readable', async () => {
    const request = new Request('http://api.test/login', {
      method: 'POST',
      headers: FORM,
      body: 'user=john&note=x+y',
    });

    const values = await parsePostForm(request);

    expect(values.get('user')).toBe('john');
    expect(values.get('note')).toBe('x y');
    expect(await request.text()).toBe('user=john&note=x+y');
  });

  it('ignores bodies of other content types', async () => {
    const request = new Request('http://api.test/login', {
      method: 'PUT',
      headers: { 'content-type': 'application/json' },
      body: 'user=john',
    });

    expect([...(await parsePostForm(request))]).toEqual([]);
  });

  it('parses the body of other methods whatever the content type', async () => {
    const request = new Request('http://api.test/sessions', {
      method: 'DELETE',
      body: 'id=1',
    });

    expect((await parsePostForm(request)).get('id')).toBe('1');
  });

  it('returns the cached values on later calls', async () => {
    const request = new Request('http://api.test/login', {
      method: 'POST',
      headers: FORM,
      body: 'user=john',
    });

    expect(await parsePostForm(request)).toBe(await parsePostForm(request));
  });

  it('rejects malformed content', async () => {
    const request = new Request('http://api.test/login', {
      method: 'PATCH',
      headers: { 'content-type': 'application/x-www-form-urlencoded; charset=utf-8' },
      body: '%zz=1',
    });

    await expect(parsePostForm(request)).rejects.toThrow(
      'unable to parse form values from body: invalid URL escape in "%zz"',
    );
  });
});
