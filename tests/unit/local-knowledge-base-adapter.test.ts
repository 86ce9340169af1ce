import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { LocalKnowledgeBaseAdapter, parseArticle } from '../../src/adapters/knowledge-base/local-knowledge-base-adapter.js';
import { createMockLogger } from '../helpers/test-doubles.js';

describe('parseArticle', () => {
  it('takes the heading as title and the first paragraph as summary', () => {
    const content = '# Connecting to the VPN\n\nInstall the client.\nSign in with SSO.\n\n## Steps\n1. Open the app';

    expect(parseArticle('vpn-setup.md', content)).toEqual({
      id: 'vpn-setup',
      title: 'Connecting to the VPN',
      summary: 'Install the client. Sign in with SSO.',
    });
  });

  it('derives the title from the file name when there is no heading', () => {
    expect(parseArticle('reset_mfa-device.txt', 'Open the portal.\n\nMore text')).toEqual({
      id: 'reset_mfa-device',
      title: 'reset mfa device',
      summary: 'Open the portal.',
    });
  });
});

describe('LocalKnowledgeBaseAdapter', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(os.tmpdir(), 'kb-'));
    await writeFile(path.join(directory, 'a.md'), '# Connecting to the VPN\n\nInstall the VPN client.');
    await writeFile(path.join(directory, 'b.md'), '# Printer setup\n\nAdd a printer. The VPN is not needed.');
    await writeFile(path.join(directory, 'notes.json'), '{"vpn": true}');
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('ranks title matches above body matches', async () => {
    const adapter = new LocalKnowledgeBaseAdapter(directory, createMockLogger());

    const result = await adapter.search('vpn not connecting', 3, 'req-1');

    expect(result).toEqual({
      status: 'success',
      data: [
        { id: 'a', title: 'Connecting to the VPN', summary: 'Install the VPN client.' },
        { id: 'b', title: 'Printer setup', summary: 'Add a printer. The VPN is not needed.' },
      ],
    });
  });

  it('honours the limit', async () => {
    const adapter = new LocalKnowledgeBaseAdapter(directory, createMockLogger());

    const result = await adapter.search('vpn', 1, 'req-1');

    expect(result.status === 'success' && result.data.map((article) => article.id)).toEqual(['a']);
  });

  it('returns no articles when nothing matches', async () => {
    const adapter = new LocalKnowledgeBaseAdapter(directory, createMockLogger());

    expect(await adapter.search('coffee machine', 3, 'req-1')).toEqual({ status: 'success', data: [] });
  });

  it('reports a missing directory as unavailable', async () => {
    const adapter = new LocalKnowledgeBaseAdapter(path.join(directory, 'missing'), createMockLogger());

    const result = await adapter.search('vpn', 3, 'req-1');

    expect(result).toMatchObject({ status: 'failure', reason: 'unavailable' });
  });
});
