/** Calls that take a callback and hand it to one of the scheduler queues. */
export type CallbackStepType =
  | 'setTimeout'
  | 'setImmediate'
  | 'promiseThen'
  | 'queueMicrotask'
  | 'nextTick'
  | 'requestAnimationFrame';

export interface LogStep {
  type: 'log';
  message: string;
  line: number;
}

export interface ThrowStep {
  type: 'throw';
  message: string;
  line: number;
}

export interface CallbackStep {
  type: CallbackStepType;
  /** Only meaningful for `setTimeout`; 0 otherwise. */
  delay: number;
  body: ScenarioStep[];
  line: number;
}

export type ScenarioStep = LogStep | ThrowStep | CallbackStep;

export class ScenarioSyntaxError extends Error {
  readonly line: number;

  constructor(message: string, line: number) {
    super(`Line ${line}: ${message}`);
    this.name = 'ScenarioSyntaxError';
    this.line = line;
  }
}
