// ─── Block Arguments ────────────────────────────────────────────────────────
//
// `a b class="x y" style=color:red` → positional [a, b] and keyword
// { class: 'x y', style: 'color:red' }.

export interface Arguments {
  positional: string[];
  keyword: Record<string, string>;
}

export function emptyArguments(): Arguments {
  return { positional: [], keyword: {} };
}

const ARGUMENT_RE = /([\w-]+)=("[^"]*"|'[^']*'|\S+)|("[^"]*"|'[^']*'|\S+)/g;

function unquote(value: string): string {
  const first = value[0];
  if (value.length >= 2 && (first === '"' || first === "'") && value.endsWith(first)) {
    return value.slice(1, -1);
  }
  return value;
}

export function parseArguments(text: string | undefined): Arguments {
  const args = emptyArguments();
  if (!text) return args;

  for (const match of text.matchAll(ARGUMENT_RE)) {
    const [, key, value, bare] = match;
    if (key !== undefined && value !== undefined) {
      args.keyword[key] = unquote(value);
    } else if (bare !== undefined) {
      args.positional.push(unquote(bare));
    }
  }
  return args;
}
