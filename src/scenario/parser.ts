import { ScenarioSyntaxError, type CallbackStepType, type ScenarioStep } from './types.js';

/**
 * Parses the snippet subset used in event-loop lessons:
 *
 * ```js
 * console.log('msg');
 * throw new Error('msg');
 * setTimeout(() => { ... }, 100);
 * setImmediate(() => { ... });
 * Promise.resolve().then(() => { ... });
 * queueMicrotask(() => { ... });
 * process.nextTick(() => { ... });
 * requestAnimationFrame(() => { ... });
 * ```
 *
 * Callbacks may also be a single expression: `setTimeout(() => console.log('x'), 0);`.
 * One statement per line; `//` comments and blank lines are skipped.
 */

const CALLEES: Record<string, CallbackStepType> = {
  'setTimeout': 'setTimeout',
  'setImmediate': 'setImmediate',
  'Promise.resolve().then': 'promiseThen',
  'queueMicrotask': 'queueMicrotask',
  'process.nextTick': 'nextTick',
  'requestAnimationFrame': 'requestAnimationFrame',
};

const CALLEE_PATTERN = '(setTimeout|setImmediate|Promise\\.resolve\\(\\)\\.then|queueMicrotask|process\\.nextTick|requestAnimationFrame)';
const ARROW_PATTERN = '\\(\\s*(?:\\(\\s*\\w*\\s*\\)|\\w+)\\s*=>\\s*';

/**
 * A quoted string whose opening quote is capture group `quoteGroup`; the raw
 * text, escapes included, is the next group.
 */
function quoted(quoteGroup: number): string {
  return `(['"\`])((?:\\\\.|(?!\\${quoteGroup}).)*)\\${quoteGroup}`;
}

function unescapeQuoted(raw: string): string {
  return raw.replace(/\\(.)/g, '$1');
}

const LOG_RE = new RegExp(`^console\\.log\\(\\s*${quoted(1)}\\s*\\)\\s*;?$`);
const THROW_RE = new RegExp(`^throw\\s+new\\s+Error\\(\\s*${quoted(1)}\\s*\\)\\s*;?$`);
const BLOCK_OPEN_RE = new RegExp(`^${CALLEE_PATTERN}${ARROW_PATTERN}\\{$`);
const INLINE_RE = new RegExp(
  `^${CALLEE_PATTERN}${ARROW_PATTERN}console\\.log\\(\\s*${quoted(2)}\\s*\\)\\s*(?:,\\s*(\\d+)\\s*)?\\)\\s*;?$`
);
const BLOCK_CLOSE_RE = /^\}\s*(?:,\s*(\d+)\s*)?\)\s*;?$/;

function stripStrings(line: string): string {
  return line.replace(/(['"`])(?:\\.|(?!\1).)*\1/g, '""');
}

function braceDelta(line: string): number {
  let delta = 0;
  for (const ch of stripStrings(line)) {
    if (ch === '{') delta++;
    else if (ch === '}') delta--;
  }
  return delta;
}

function toCallbackType(callee: string, line: number): CallbackStepType {
  const type = CALLEES[callee];
  if (!type) throw new ScenarioSyntaxError(`Unsupported call "${callee}".`, line);
  return type;
}

function parseDelay(type: CallbackStepType, raw: string | undefined, line: number): number {
  if (raw === undefined) return 0;
  if (type !== 'setTimeout') {
    throw new ScenarioSyntaxError(`Only setTimeout accepts a delay.`, line);
  }
  return Number.parseInt(raw, 10);
}

export function parseScenario(source: string): ScenarioStep[] {
  const lines = source.split(/\r?\n/);

  const parseBlock = (start: number, end: number): ScenarioStep[] => {
    const steps: ScenarioStep[] = [];

    for (let i = start; i < end; i++) {
      const lineNumber = i + 1;
      const raw = lines[i].trim();
      if (!raw || raw.startsWith('//')) continue;

      const log = LOG_RE.exec(raw);
      if (log) {
        steps.push({ type: 'log', message: unescapeQuoted(log[2]), line: lineNumber });
        continue;
      }

      const thrown = THROW_RE.exec(raw);
      if (thrown) {
        steps.push({ type: 'throw', message: unescapeQuoted(thrown[2]), line: lineNumber });
        continue;
      }

      const inline = INLINE_RE.exec(raw);
      if (inline) {
        const type = toCallbackType(inline[1], lineNumber);
        steps.push({
          type,
          delay: parseDelay(type, inline[4], lineNumber),
          body: [{ type: 'log', message: unescapeQuoted(inline[3]), line: lineNumber }],
          line: lineNumber,
        });
        continue;
      }

      const open = BLOCK_OPEN_RE.exec(raw);
      if (open) {
        const type = toCallbackType(open[1], lineNumber);

        let balance = 1;
        let j = i + 1;
        for (; j < end; j++) {
          balance += braceDelta(lines[j]);
          if (balance === 0) break;
        }
        if (j >= end) {
          throw new ScenarioSyntaxError(`Unclosed callback body.`, lineNumber);
        }

        const close = BLOCK_CLOSE_RE.exec(lines[j].trim());
        if (!close) {
          throw new ScenarioSyntaxError(`Expected "})" to close the callback.`, j + 1);
        }

        steps.push({
          type,
          delay: parseDelay(type, close[1], j + 1),
          body: parseBlock(i + 1, j),
          line: lineNumber,
        });
        i = j;
        continue;
      }

      throw new ScenarioSyntaxError(`Unsupported statement: ${raw}`, lineNumber);
    }

    return steps;
  };

  return parseBlock(0, lines.length);
}
