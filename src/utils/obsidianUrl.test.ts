import { describe, it, expect } from 'vitest';
import { asObsidianUrl, normalizeVaultPath, titleFor, withoutMd } from './obsidianUrl.js';

function decodeQuery(url: string): Record<string, string> {
  const query = url.slice('obsidian://open?'.length);
  return Object.fromEntries(
    query.split('&').map(pair => {
      const [key, value] = pair.split('=');
      return [key, decodeURIComponent(value)];
    })
  );
}

describe('asObsidianUrl', () => {
  it('percent-encodes the file path', () => {
    expect(asObsidianUrl('Notes/My Plan & Ideas #1.md', 'work')).toBe(
      'obsidian://open?vault=work&file=Notes%2FMy%20Plan%20%26%20Ideas%20%231.md'
    );
  });

  it('percent-encodes the vault identifier', () => {
    expect(asObsidianUrl('Inbox.md', 'My Vault')).toBe('obsidian://open?vault=My%20Vault&file=Inbox.md');
  });

  it.each([
    ['Notes.md', 'work'],
    ['daily/2024-01-01.md', 'a1b2c3d4e5f6a7b8'],
    ['Q&A?.md', 'work & play'],
    ['100% done + more.md', 'vault=1'],
    ['日本語/ノート.md', 'work'],
  ])('decodes back to %s in vault %s with a single &', (filePath, vault) => {
    const url = asObsidianUrl(filePath, vault);
    expect(url.match(/&/g)).toHaveLength(1);
    expect(decodeQuery(url)).toEqual({ vault, file: filePath });
  });
});

describe('titleFor', () => {
  it('strips a trailing .md from the base name', () => {
    expect(titleFor('Projects/Notes.md')).toBe('Notes');
  });

  it('keeps other extensions', () => {
    expect(titleFor('plan.txt')).toBe('plan.txt');
    expect(titleFor('archive.md.bak')).toBe('archive.md.bak');
    expect(titleFor('Upper.MD')).toBe('Upper.MD');
  });

  it('strips only one .md', () => {
    expect(withoutMd('twice.md.md')).toBe('twice.md');
  });
});

describe('normalizeVaultPath', () => {
  it('drops a leading ./', () => {
    expect(normalizeVaultPath('./daily/today.md')).toBe('daily/today.md');
    expect(normalizeVaultPath('daily/today.md')).toBe('daily/today.md');
  });
});
