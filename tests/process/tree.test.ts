import { buildProcessTree, parseProcessListing, resolveTargetDescendant } from '../../src/process/tree.js';

describe('parseProcessListing', () => {
  it('splits rows on whitespace and skips short rows', () => {
    const entries = parseProcessListing('  PID  PPID COMM\n 100     1 bash\n\n200\n 300   100 /usr/bin/claude\n');

    expect(entries).toEqual([
      { pid: 'PID', parentId: 'PPID', commandName: 'COMM' },
      { pid: '100', parentId: '1', commandName: 'bash' },
      { pid: '300', parentId: '100', commandName: '/usr/bin/claude' },
    ]);
  });

  it('returns nothing for empty output', () => {
    expect(parseProcessListing('')).toEqual([]);
  });
});

describe('buildProcessTree', () => {
  it('groups children by parent in listing order', () => {
    const tree = buildProcessTree(parseProcessListing('2 1 a\n3 1 b\n4 2 c\n'));

    expect(tree.get('1')?.map((entry) => entry.pid)).toEqual(['2', '3']);
    expect(tree.get('2')?.map((entry) => entry.pid)).toEqual(['4']);
    expect(tree.get('4')).toBeUndefined();
  });
});

describe('resolveTargetDescendant', () => {
  const cases: Array<{ name: string; listing: string; want: string | undefined }> = [
    { name: 'claude as direct child', listing: '16174 14460 claude\n', want: 'claude' },
    { name: 'codex as direct child', listing: '16174 14460 codex\n', want: 'codex' },
    { name: 'no target child', listing: '16174 14460 vim\n', want: undefined },
    { name: 'node alone is not a target', listing: '16174 14460 node\n', want: undefined },
    { name: 'one of several children is claude', listing: '16174 14460 fish\n16175 14460 claude\n', want: 'claude' },
    { name: 'empty listing', listing: '', want: undefined },
    { name: 'codex as grandchild via node', listing: '42545 14460 node\n42546 42545 codex\n', want: 'codex' },
    { name: 'claude as grandchild via shell', listing: '100 14460 bash\n200 100 claude\n', want: 'claude' },
    {
      name: 'codex with full path',
      listing: '42546 14460 /opt/homebrew/lib/node_modules/@openai/codex/codex\n',
      want: 'codex',
    },
    { name: 'node dev server is not a target', listing: '22535 14460 npm\n22564 22535 node\n', want: undefined },
    { name: 'deep descendant', listing: '1 14460 zsh\n2 1 npx\n3 2 node\n4 3 claude\n', want: 'claude' },
  ];

  for (const { name, listing, want } of cases) {
    it(name, () => {
      expect(resolveTargetDescendant(listing, '14460')).toBe(want);
    });
  }

  it('returns nothing when the root has no children', () => {
    expect(resolveTargetDescendant('2 1 claude\n', '999')).toBeUndefined();
  });

  it('does not match the root process itself', () => {
    expect(resolveTargetDescendant('14460 1 claude\n', '14460')).toBeUndefined();
  });

  it('matches base names exactly and case-sensitively', () => {
    expect(resolveTargetDescendant('2 1 Claude\n3 1 claude-helper\n4 1 xcodex\n', '1')).toBeUndefined();
  });

  it('explores the first sibling subtree fully before the next sibling', () => {
    // node (first sibling) wraps claude two levels down; codex is a direct sibling.
    const listing = '10 1 node\n11 1 codex\n20 10 sh\n30 20 claude\n';
    expect(resolveTargetDescendant(listing, '1')).toBe('claude');
  });

  it('lets the earlier sibling win regardless of depth', () => {
    const listing = '11 1 codex\n10 1 node\n20 10 sh\n30 20 claude\n';
    expect(resolveTargetDescendant(listing, '1')).toBe('codex');
  });

  it('is unaffected by reordering sibling subtrees without a match', () => {
    const a = '10 1 vim\n11 1 bash\n12 11 less\n13 1 node\n14 13 codex\n';
    const b = '11 1 bash\n12 11 less\n10 1 vim\n13 1 node\n14 13 codex\n';
    expect(resolveTargetDescendant(a, '1')).toBe('codex');
    expect(resolveTargetDescendant(b, '1')).toBe('codex');
  });

  it('terminates on a process listed as its own parent', () => {
    const listing = '0 0 kernel_task\n1 0 launchd\n';
    expect(resolveTargetDescendant(listing, '0')).toBeUndefined();
  });

  it('accepts pre-parsed entries and a custom predicate', () => {
    const entries = [
      { pid: '2', parentId: '1', commandName: '/usr/local/bin/aider' },
      { pid: '3', parentId: '1', commandName: 'claude' },
    ];
    expect(resolveTargetDescendant(entries, '1', (command) => command.endsWith('aider'))).toBe('aider');
  });
});
