import { MuxConfigError } from '../../utils/errors';

/**
 * Node of a property tree in the INFO format used by multiplexer configuration files:
 *
 *   key value ; comment
 *   block {
 *       nested "quoted value"
 *   }
 */
export interface InfoNode {
  key: string;
  value?: string;
  children: InfoNode[];
  line: number;
}

type Token =
  | { kind: 'word'; text: string; line: number }
  | { kind: 'open'; line: number }
  | { kind: 'close'; line: number };

const ESCAPES: Record<string, string> = { n: '\n', t: '\t', r: '\r', '"': '"', '\\': '\\', '0': '\0' };

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let line = 1;
  let i = 0;

  while (i < source.length) {
    const ch = source[i];

    if (ch === '\n') {
      line++;
      i++;
    } else if (/\s/.test(ch)) {
      i++;
    } else if (ch === ';') {
      // Comment runs to end of line
      while (i < source.length && source[i] !== '\n') i++;
    } else if (ch === '{') {
      tokens.push({ kind: 'open', line });
      i++;
    } else if (ch === '}') {
      tokens.push({ kind: 'close', line });
      i++;
    } else if (ch === '"') {
      const startLine = line;
      let text = '';
      i++;
      while (i < source.length && source[i] !== '"') {
        if (source[i] === '\n') {
          throw new MuxConfigError('Unterminated string', startLine);
        }
        if (source[i] === '\\' && i + 1 < source.length) {
          const escaped = source[i + 1];
          text += ESCAPES[escaped] ?? escaped;
          i += 2;
        } else {
          text += source[i];
          i++;
        }
      }
      if (i >= source.length) {
        throw new MuxConfigError('Unterminated string', startLine);
      }
      i++; // closing quote
      tokens.push({ kind: 'word', text, line: startLine });
    } else {
      let text = '';
      while (i < source.length && !/[\s{};"]/.test(source[i])) {
        text += source[i];
        i++;
      }
      tokens.push({ kind: 'word', text, line });
    }
  }

  return tokens;
}

/**
 * Parse INFO text into a list of top-level nodes
 */
export function parseInfo(source: string): InfoNode[] {
  const tokens = tokenize(source);
  let pos = 0;

  const parseEntries = (depth: number): InfoNode[] => {
    const nodes: InfoNode[] = [];

    while (pos < tokens.length) {
      const token = tokens[pos];

      if (token.kind === 'close') {
        if (depth === 0) {
          throw new MuxConfigError('Unexpected "}"', token.line);
        }
        pos++;
        return nodes;
      }
      if (token.kind === 'open') {
        throw new MuxConfigError('Block without a key', token.line);
      }

      const node: InfoNode = { key: token.text, children: [], line: token.line };
      pos++;

      // A value sits on the same line as its key
      const next = tokens[pos];
      if (next && next.kind === 'word' && next.line === token.line) {
        node.value = next.text;
        pos++;
      }

      if (tokens[pos]?.kind === 'open') {
        pos++;
        node.children = parseEntries(depth + 1);
      }

      nodes.push(node);
    }

    if (depth > 0) {
      throw new MuxConfigError('Missing "}" at end of file');
    }
    return nodes;
  };

  return parseEntries(0);
}

export function child(node: InfoNode | undefined, key: string): InfoNode | undefined {
  return node?.children.find((entry) => entry.key === key);
}

export function childValue(node: InfoNode | undefined, key: string): string | undefined {
  return child(node, key)?.value;
}
