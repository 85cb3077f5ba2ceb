import { PatternCompileError } from '@gitremap/shared';

/** Text matched literally; metacharacters are escaped on render. */
export type LiteralNode = {
  kind: 'literal';
  value: string;
};

/** Regex syntax owned by this module, rendered as written. */
export type RawNode = {
  kind: 'raw';
  source: string;
};

/** A caller-supplied fragment, validated before it reaches the tree. */
export type FragmentNode = {
  kind: 'fragment';
  field: string;
  source: string;
};

export type SequenceNode = {
  kind: 'sequence';
  items: RegexNode[];
};

export type AlternationNode = {
  kind: 'alternation';
  options: RegexNode[];
};

export type CaptureNode = {
  kind: 'capture';
  name: string;
  body: RegexNode;
};

export type QuantifiedNode = {
  kind: 'quantified';
  body: RegexNode;
  quantifier: '?' | '*' | '+';
  lazy: boolean;
};

export type RegexNode =
  | LiteralNode
  | RawNode
  | FragmentNode
  | SequenceNode
  | AlternationNode
  | CaptureNode
  | QuantifiedNode;

export interface FragmentScan {
  /** Offsets of `^` and `$` outside character classes */
  anchors: number[];
  /** Names of `(?<name>...)` groups declared by the fragment */
  groupNames: string[];
}

const META = /[.*+?^${}()|[\]\\/]/g;

export function literal(value: string): LiteralNode {
  return { kind: 'literal', value };
}

export function raw(source: string): RawNode {
  return { kind: 'raw', source };
}

export function seq(...items: RegexNode[]): SequenceNode {
  return { kind: 'sequence', items };
}

export function alt(...options: RegexNode[]): AlternationNode {
  return { kind: 'alternation', options };
}

export function capture(name: string, body: RegexNode): CaptureNode {
  return { kind: 'capture', name, body };
}

export function optional(body: RegexNode, options: { lazy?: boolean } = {}): QuantifiedNode {
  return { kind: 'quantified', body, quantifier: '?', lazy: options.lazy ?? false };
}

export function oneOrMore(body: RegexNode): QuantifiedNode {
  return { kind: 'quantified', body, quantifier: '+', lazy: false };
}

/**
 * Walks a fragment the way the regex parser would, tracking escapes and
 * character classes, and reports anchors and named groups.
 */
export function scanFragment(source: string): FragmentScan {
  const anchors: number[] = [];
  const groupNames: string[] = [];
  let inClass = false;

  for (let i = 0; i < source.length; i++) {
    const c = source[i];
    if (c === '\\') {
      i++;
      continue;
    }
    if (inClass) {
      if (c === ']') inClass = false;
      continue;
    }
    if (c === '[') {
      inClass = true;
      if (source[i + 1] === '^') i++;
      continue;
    }
    if (c === '^' || c === '$') {
      anchors.push(i);
      continue;
    }
    if (c === '(' && source.startsWith('?<', i + 1)) {
      const end = source.indexOf('>', i + 3);
      const name = source.slice(i + 3, end);
      // (?<= and (?<! are lookbehinds
      if (end !== -1 && name !== '' && !name.startsWith('=') && !name.startsWith('!')) {
        groupNames.push(name);
      }
    }
  }

  return { anchors, groupNames };
}

/**
 * Validates a caller-supplied fragment and wraps it as a tree node.
 * `reserved` lists group names the surrounding pattern already uses.
 */
export function fragment(field: string, source: string, reserved: string[] = []): FragmentNode {
  try {
    new RegExp(source);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PatternCompileError(field, source, reason, { cause: error });
  }

  const scan = scanFragment(source);
  if (scan.anchors.length > 0) {
    throw new PatternCompileError(
      field,
      source,
      `anchors are not allowed (found "${source[scan.anchors[0]]}" at offset ${scan.anchors[0]})`,
    );
  }
  const clash = scan.groupNames.find((name) => reserved.includes(name));
  if (clash !== undefined) {
    throw new PatternCompileError(field, source, `group name "${clash}" is reserved`);
  }

  return { kind: 'fragment', field, source };
}

export function render(node: RegexNode): string {
  switch (node.kind) {
    case 'literal':
      return node.value.replace(META, '\\$&');
    case 'raw':
      return node.source;
    case 'fragment':
      return `(?:${node.source})`;
    case 'sequence':
      return node.items.map(render).join('');
    case 'alternation':
      return `(?:${node.options.map(render).join('|')})`;
    case 'capture':
      return `(?<${node.name}>${render(node.body)})`;
    case 'quantified':
      return `${renderAtom(node.body)}${node.quantifier}${node.lazy ? '?' : ''}`;
  }
}

function renderAtom(node: RegexNode): string {
  if (node.kind === 'fragment' || node.kind === 'alternation' || node.kind === 'capture') {
    return render(node);
  }
  if (node.kind === 'literal' && node.value.length === 1) {
    return render(node);
  }
  return `(?:${render(node)})`;
}
