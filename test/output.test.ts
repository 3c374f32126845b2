/**
 * Tests for the output encoders
 */

import { describe, it, expect, beforeAll } from 'vitest';
import { indexSources } from '../src/indexer';
import { encodeCompact, encodeIndex, encodeJson, encodeMarkdown, collectSnippets } from '../src/output/index';
import type { ContentLookup } from '../src/output/index';
import { createMemorySources } from '../src/sources/index';
import type { NavigationIndex } from '../src/types/index';
import { extractSnippet, estimateTokens } from '../src/utils/strings';
import { Logger } from '../src/utils/logger';

const files: Record<string, string> = {
  'main.py': 'import lib\nimport requests\n',
  'lib.py': 'def helper():\n    pass\n',
};

const contents: ContentLookup = (filePath) => files[filePath];

let index: NavigationIndex;

beforeAll(async () => {
  const result = await indexSources(createMemorySources(files), {
    root: 'demo',
    logger: new Logger({ level: 'silent' }),
  });
  index = result.index;
});

describe('encodeCompact', () => {
  it('should list the summary, paths and one line per file', () => {
    expect(encodeCompact(index)).toBe(
      [
        '# demo: 2 files, 1 resolved / 1 unresolved imports',
        'entry: main.py',
        'path: main.py > lib.py',
        'lib.py (python, 2L) | fn: helper()',
        'main.py (python, 2L) -> lib.py',
      ].join('\n')
    );
  });

  it('should stop adding files once the budget is spent', () => {
    expect(encodeCompact(index, { maxTokens: 0 }).split('\n')).toEqual([
      '# demo: 2 files, 1 resolved / 1 unresolved imports',
      'entry: main.py',
      'path: main.py > lib.py',
      '... 2 more files omitted',
    ]);
  });

  it('should be selected by encodeIndex', () => {
    expect(encodeIndex(index, 'compact', { maxTokens: 6000 })).toBe(encodeCompact(index));
  });
});

describe('encodeJson', () => {
  it('should round-trip the index', () => {
    expect(JSON.parse(encodeJson(index))).toEqual(JSON.parse(JSON.stringify(index)));
  });

  it('should write a single line when not pretty', () => {
    expect(encodeJson(index, { pretty: false })).not.toContain('\n');
  });

  it('should attach snippets keyed by file', () => {
    const parsed: unknown = JSON.parse(encodeJson(index, { snippets: true, contents }));
    expect(parsed).toMatchObject({
      snippets: {
        'lib.py': [
          { name: 'helper', line: 1, startLine: 1, endLine: 2, text: '1 | def helper():\n2 |     pass' },
        ],
      },
    });
  });
});

describe('encodeMarkdown', () => {
  it('should render the summary and graph sections', () => {
    const lines = encodeMarkdown(index).split('\n');

    expect(lines[0]).toBe('# Navigation Index: demo');
    expect(lines).toContain('- Files: 2 (2 parsed, 0 skipped, 0 failed)');
    expect(lines).toContain('- Languages: python (2)');
    expect(lines).toContain('- Imports: 1 resolved, 1 unresolved');
    expect(lines).toContain("- `main.py`: file name 'main' is a conventional entry point (filename-pattern)");
    expect(lines).toContain('| `lib.py` | 1 | 0 |');
    expect(lines).toContain('`main.py` → `lib.py`');
    expect(lines).toContain('_main.py reaches lib.py (imported 1 time) in 1 hop_');
    expect(lines).toContain('- `helper()` line 1');
    expect(lines).toContain('- `main.py`: `requests`');
    expect(lines).not.toContain('## Cycles');
  });

  it('should include snippets only when asked', () => {
    expect(encodeMarkdown(index, { contents }).split('\n')).not.toContain('## Snippets');

    const lines = encodeMarkdown(index, { snippets: true, contents }).split('\n');
    const start = lines.indexOf('### `lib.py`: helper');
    expect(start).toBeGreaterThan(0);
    expect(lines.slice(start + 2, start + 6)).toEqual(['```python', '1 | def helper():', '2 |     pass', '```']);
  });
});

describe('collectSnippets', () => {
  it('should skip files without contents', () => {
    expect(collectSnippets(index, () => undefined).size).toBe(0);
  });
});

describe('extractSnippet', () => {
  const text = 'a\nb\nc\nd\ne\nf\ng\nh\ni\nj\n';

  it('should pad line numbers to the widest shown', () => {
    expect(extractSnippet(text, 10, 1)).toEqual({
      startLine: 9,
      endLine: 10,
      lines: ['i', 'j'],
      text: ' 9 | i\n10 | j',
    });
  });

  it('should clamp lines past the end', () => {
    expect(extractSnippet(text, 100, 0).text).toBe('10 | j');
  });

  it('should show only the line without context', () => {
    expect(extractSnippet(text, 1, 0).text).toBe('1 | a');
  });
});

describe('estimateTokens', () => {
  it('should count four characters per token', () => {
    expect(estimateTokens('')).toBe(0);
    expect(estimateTokens('abcde')).toBe(2);
  });
});
