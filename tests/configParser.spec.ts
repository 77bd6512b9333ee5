import { parseAgentConfig } from '../src/services/configParser';

describe('parseAgentConfig', () => {
  it('reads a JSON object', () => {
    expect(parseAgentConfig('{"name":"Scout","role":"Researcher"}')).toEqual({
      kind: 'mapping',
      value: { name: 'Scout', role: 'Researcher' }
    });
  });

  it('reads a YAML mapping', () => {
    expect(parseAgentConfig('name: Scout\ntools:\n  - search\n')).toEqual({
      kind: 'mapping',
      value: { name: 'Scout', tools: ['search'] }
    });
  });

  it('treats plain prose as free text', () => {
    const text = 'Summarises support tickets every morning';
    expect(parseAgentConfig(text)).toEqual({ kind: 'text', value: text });
  });

  it('treats YAML lists and scalars as free text', () => {
    expect(parseAgentConfig('- a\n- b')).toEqual({ kind: 'text', value: '- a\n- b' });
    expect(parseAgentConfig('42')).toEqual({ kind: 'text', value: '42' });
  });

  it('degrades malformed config to free text', () => {
    expect(parseAgentConfig('{"name": ')).toEqual({ kind: 'text', value: '{"name": ' });
    expect(parseAgentConfig('tools: [search')).toEqual({ kind: 'text', value: 'tools: [search' });
  });

  it('returns empty input unchanged', () => {
    expect(parseAgentConfig('')).toEqual({ kind: 'text', value: '' });
  });
});
