import keywordData from './keywords.json' with { type: 'json' };

export type KeywordKind =
  | 'instructionMnemonic'
  | 'preprocessorFunction'
  | 'preprocessorDirective'
  | 'assemblerDirective'
  | 'pragma'
  | 'registerName'
  | 'branchingCondition';

/**
 * A keyword table entry.
 *
 * `params` meaning depends on `kind`:
 * - instructionMnemonic: opcode index, min operands, max operands
 * - preprocessorFunction: function index, min args, max args
 * - registerName: register code, size in bytes
 * - branchingCondition: condition code
 * - directives/pragmas: sub-kind index
 *
 * Aliases (`.elif`, `jp`...) carry the parameters of their `canonical` spelling.
 */
export interface KeywordEntry {
  readonly name: string;
  readonly kind: KeywordKind;
  readonly canonical: string;
  readonly params: readonly [number, number, number];
}

const KEYWORD_KINDS: readonly KeywordKind[] = [
  'instructionMnemonic',
  'preprocessorFunction',
  'preprocessorDirective',
  'assemblerDirective',
  'pragma',
  'registerName',
  'branchingCondition',
];

type RawEntry = { name: string; params?: number[]; alias?: string };

function toParams(raw: number[] | undefined, name: string): readonly [number, number, number] {
  if (!raw || raw.length !== 3) {
    throw new Error(`keywords.json: entry "${name}" must have exactly three params`);
  }
  const [a = 0, b = 0, c = 0] = raw;
  return [a, b, c];
}

function buildTable(): ReadonlyMap<string, KeywordEntry> {
  const table = new Map<string, KeywordEntry>();
  const data: Record<KeywordKind, RawEntry[]> = keywordData;
  for (const kind of KEYWORD_KINDS) {
    const entries = data[kind];
    for (const e of entries) {
      if (e.alias !== undefined) continue;
      table.set(e.name, { name: e.name, kind, canonical: e.name, params: toParams(e.params, e.name) });
    }
    for (const e of entries) {
      if (e.alias === undefined) continue;
      const target = table.get(e.alias);
      if (!target || target.kind !== kind) {
        throw new Error(`keywords.json: alias "${e.name}" refers to unknown ${kind} "${e.alias}"`);
      }
      table.set(e.name, { name: e.name, kind, canonical: target.name, params: target.params });
    }
  }
  return table;
}

// Static data: a malformed table is a build defect, so it fails at module load.
const KEYWORDS = buildTable();

/**
 * Case-insensitive keyword lookup.
 */
export function lookupKeyword(name: string): KeywordEntry | undefined {
  return KEYWORDS.get(name.toLowerCase());
}

export function isKeyword(name: string): boolean {
  return KEYWORDS.has(name.toLowerCase());
}

/**
 * All entries of one kind, in table order (canonical spellings before aliases).
 */
export function keywordsOfKind(kind: KeywordKind): KeywordEntry[] {
  return [...KEYWORDS.values()].filter((k) => k.kind === kind);
}

export function operandRange(entry: KeywordEntry): { min: number; max: number } {
  return { min: entry.params[1], max: entry.params[2] };
}
