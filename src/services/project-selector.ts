/**
 * Interactive project selector.
 *
 * The key handling is a pure reducer so it can be exercised without a
 * terminal; `selectProjectInteractively` wires it to raw-mode stdin and
 * redraws the list in place.
 */

import { AuthError } from '../types/auth-error';
import type { Project } from '../types';

export type SelectorKey =
  | { type: 'up' }
  | { type: 'down' }
  | { type: 'digit'; digit: string }
  | { type: 'backspace' }
  | { type: 'clear' }
  | { type: 'commit' }
  | { type: 'abort' };

export type SelectorOutcome = 'pending' | 'selected' | 'aborted';

export interface ProjectSelectState {
  readonly cursor: number;
  readonly numberBuffer: string;
  readonly outcome: SelectorOutcome;
}

export const SELECTOR_HELP =
  'Use ↑/↓ arrows or number keys to navigate, enter to select, q to quit';

export function initialProjectSelectState(): ProjectSelectState {
  return { cursor: 0, numberBuffer: '', outcome: 'pending' };
}

/**
 * Move the cursor to the 1-based index in `buffer`. An out-of-range or
 * non-numeric buffer leaves the state untouched.
 */
function applyNumberBuffer(state: ProjectSelectState, buffer: string, count: number): ProjectSelectState {
  if (buffer === '') {
    return { ...state, numberBuffer: '' };
  }
  if (!/^\d+$/.test(buffer)) {
    return state;
  }
  const index = Number.parseInt(buffer, 10) - 1;
  if (index < 0 || index >= count) {
    return state;
  }
  return { ...state, numberBuffer: buffer, cursor: index };
}

export function reduceProjectSelect(
  state: ProjectSelectState,
  key: SelectorKey,
  projectCount: number
): ProjectSelectState {
  if (state.outcome !== 'pending') {
    return state;
  }

  switch (key.type) {
    case 'up':
      return { ...state, numberBuffer: '', cursor: Math.max(0, state.cursor - 1) };
    case 'down':
      return { ...state, numberBuffer: '', cursor: Math.min(projectCount - 1, state.cursor + 1) };
    case 'digit':
      return applyNumberBuffer(state, state.numberBuffer + key.digit, projectCount);
    case 'backspace':
      if (state.numberBuffer === '') {
        return state;
      }
      return applyNumberBuffer(state, state.numberBuffer.slice(0, -1), projectCount);
    case 'clear':
      return { ...state, numberBuffer: '' };
    case 'commit':
      return projectCount > 0 ? { ...state, outcome: 'selected' } : state;
    case 'abort':
      return { ...state, outcome: 'aborted' };
  }
}

const ESCAPE_SEQUENCES: ReadonlyArray<readonly [string, SelectorKey]> = [
  ['\u001b[A', { type: 'up' }],
  ['\u001bOA', { type: 'up' }],
  ['\u001b[B', { type: 'down' }],
  ['\u001bOB', { type: 'down' }],
];

/**
 * Translate raw terminal input into selector keys. A chunk may carry several
 * keys (fast typing or a paste); unknown input is dropped.
 */
export function decodeSelectorKeys(chunk: Buffer | string): SelectorKey[] {
  const text = typeof chunk === 'string' ? chunk : chunk.toString('utf8');
  const keys: SelectorKey[] = [];
  let i = 0;

  while (i < text.length) {
    const rest = text.slice(i);
    const sequence = ESCAPE_SEQUENCES.find(([prefix]) => rest.startsWith(prefix));
    if (sequence) {
      keys.push(sequence[1]);
      i += sequence[0].length;
      continue;
    }

    const ch = text[i];
    if (ch === '\u001b') {
      // CSI sequence we do not handle: skip to its final byte
      const csi = /^\u001b\[[0-9;]*[~A-Za-z]/.exec(rest);
      if (csi) {
        i += csi[0].length;
        continue;
      }
      keys.push({ type: 'clear' });
    } else if (ch >= '0' && ch <= '9') {
      keys.push({ type: 'digit', digit: ch });
    } else if (ch === 'k') {
      keys.push({ type: 'up' });
    } else if (ch === 'j') {
      keys.push({ type: 'down' });
    } else if (ch === '\r' || ch === '\n' || ch === ' ') {
      keys.push({ type: 'commit' });
    } else if (ch === '\u007f' || ch === '\b') {
      keys.push({ type: 'backspace' });
    } else if (ch === '\u0017') {
      keys.push({ type: 'clear' });
    } else if (ch === 'q' || ch === '\u0003') {
      keys.push({ type: 'abort' });
    }
    i += 1;
  }

  return keys;
}

export function renderProjectSelect(state: ProjectSelectState, projects: readonly Project[]): string {
  const lines = ['Select a project:', ''];
  projects.forEach((project, i) => {
    const marker = i === state.cursor ? '>' : ' ';
    lines.push(`${marker} ${i + 1}. ${project.name} (${project.id})`);
  });
  if (state.numberBuffer !== '') {
    lines.push('', `Typing: ${state.numberBuffer}`);
  }
  lines.push(SELECTOR_HELP);
  return lines.join('\n');
}

export interface SelectorInputStream {
  readonly isTTY?: boolean;
  setRawMode?: (mode: boolean) => void;
  resume: () => void;
  pause: () => void;
  on: (event: 'data' | 'end', listener: (chunk?: unknown) => void) => void;
  off: (event: 'data' | 'end', listener: (chunk?: unknown) => void) => void;
}

export interface SelectorIO {
  input: SelectorInputStream;
  write: (text: string) => void;
}

export type ProjectSelector = (projects: readonly Project[]) => Promise<string>;

function defaultSelectorIO(): SelectorIO {
  return {
    input: process.stdin,
    write: (text) => {
      process.stdout.write(text);
    },
  };
}

function chunkText(chunk: unknown): string {
  if (typeof chunk === 'string') return chunk;
  if (Buffer.isBuffer(chunk)) return chunk.toString('utf8');
  return '';
}

/**
 * Let the user pick one of `projects` and return its id.
 */
export function selectProjectInteractively(
  projects: readonly Project[],
  io: SelectorIO = defaultSelectorIO()
): Promise<string> {
  const { input } = io;

  if (!input.isTTY || typeof input.setRawMode !== 'function') {
    return Promise.reject(
      new AuthError(
        'NoTTY',
        'project selection requires an interactive terminal; use --project-id or CIRRUS_PROJECT_ID'
      )
    );
  }
  if (projects.length === 0) {
    return Promise.reject(new AuthError('UserAborted', 'no project selected'));
  }

  return new Promise<string>((resolve, reject) => {
    let state = initialProjectSelectState();
    let drawnLines = 0;

    const draw = () => {
      const frame = renderProjectSelect(state, projects);
      const rewind = drawnLines > 0 ? `\u001b[${drawnLines}F\u001b[0J` : '';
      io.write(`${rewind}${frame}\n`);
      drawnLines = frame.split('\n').length;
    };

    const cleanup = () => {
      input.off('data', onData);
      input.off('end', onEnd);
      input.setRawMode?.(false);
      input.pause();
    };

    function onData(chunk?: unknown): void {
      for (const key of decodeSelectorKeys(chunkText(chunk))) {
        state = reduceProjectSelect(state, key, projects.length);
        if (state.outcome !== 'pending') break;
      }

      if (state.outcome === 'selected') {
        cleanup();
        resolve(projects[state.cursor].id);
        return;
      }
      if (state.outcome === 'aborted') {
        cleanup();
        reject(new AuthError('UserAborted', 'project selection cancelled'));
        return;
      }
      draw();
    }

    function onEnd(): void {
      cleanup();
      reject(new AuthError('UserAborted', 'no project selected'));
    }

    input.setRawMode?.(true);
    input.on('data', onData);
    input.on('end', onEnd);
    input.resume();
    draw();
  });
}
