import { requestCommandStatus } from './blink-api';
import type BlinkAuth from './blink-auth';
import { COMMAND_STATUS_OK } from './constants';
import type { BlinkLogger } from './logger';
import type { CommandResponse, CommandStatusResponse } from './types';

export type CommandKind =
  | 'arm'
  | 'disarm'
  | 'thumbnail'
  | 'clip'
  | 'motion-detect'
  | 'network-update';

export type BlinkCommand = {
  id: number;
  networkId: number;
  kind: CommandKind;
  complete: boolean;
};

export type CommandState = 'pending' | 'unknown' | 'completed' | 'failed';
export type CommandOutcome = 'completed' | 'failed' | 'timed_out';

export type CommandResult = {
  outcome: CommandOutcome;
  command: BlinkCommand;
  attempts: number;
  /** Classification of the last status response; `unknown` when it carried no completion flag. */
  lastState: CommandState;
  status: CommandStatusResponse | null;
};

export type PollBudget = {
  intervalMs: number;
  maxAttempts: number;
  timeoutMs: number | null;
};

export type PollResult<T> =
  | { done: true; value: T; attempts: number }
  | { done: false; value: T | null; attempts: number };

export const sleep = (ms: number) =>
  new Promise<void>(resolve => {
    setTimeout(resolve, ms);
  });

/**
 * Calls `check` until it reports done or the budget runs out. No wait follows the last attempt,
 * so a loop that never finishes makes exactly `maxAttempts` calls.
 */
export const pollUntil = async <T>(
  check: () => Promise<{ done: boolean; value: T }>,
  { intervalMs, maxAttempts, timeoutMs }: PollBudget
): Promise<PollResult<T>> => {
  const startedAt = Date.now();
  let last: T | null = null;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const { done, value } = await check();
    if (done) {
      return { done: true, value, attempts: attempt };
    }
    last = value;

    const budgetLeft = timeoutMs === null ? Infinity : timeoutMs - (Date.now() - startedAt);
    if (attempt === maxAttempts || budgetLeft <= intervalMs) {
      return { done: false, value: last, attempts: attempt };
    }

    await sleep(intervalMs);
  }

  return { done: false, value: last, attempts: maxAttempts };
};

export const classifyStatus = (status: CommandStatusResponse): CommandState => {
  if (status.status_code !== undefined && status.status_code !== COMMAND_STATUS_OK) {
    return 'failed';
  }
  if (status.complete === true) {
    return 'completed';
  }
  if (status.complete === false) {
    return 'pending';
  }

  return 'unknown';
};

export default class CommandPoller {
  private _auth: BlinkAuth;
  private _log: BlinkLogger;

  constructor(auth: BlinkAuth) {
    this._auth = auth;
    this._log = auth.options.logger;
  }

  /** Null when the server accepted the request without starting a trackable command. */
  toCommand = (kind: CommandKind, response: CommandResponse): BlinkCommand | null => {
    if (typeof response.id !== 'number' || typeof response.network_id !== 'number') {
      this._log.debug(`No command to track for ${kind}: ${JSON.stringify(response)}`);
      return null;
    }

    return { id: response.id, networkId: response.network_id, kind, complete: false };
  };

  wait = async (command: BlinkCommand): Promise<CommandResult> => {
    const result = await pollUntil(async () => {
      const status = await requestCommandStatus(this._auth, command.networkId, command.id);
      const state = classifyStatus(status);

      if (state === 'unknown') {
        this._log.warn(`Command ${command.id} status has no completion flag`, status);
      }

      return { done: state === 'completed' || state === 'failed', value: { status, state } };
    }, this._auth.options.commandPoll);

    const lastState = result.value?.state ?? 'pending';
    let outcome: CommandOutcome = 'timed_out';
    if (result.done) {
      outcome = lastState === 'completed' ? 'completed' : 'failed';
    }

    this._log.debug(
      `Command ${command.kind}/${command.id} ${outcome} after ${result.attempts} polls`
    );

    return {
      outcome,
      command: { ...command, complete: outcome === 'completed' },
      attempts: result.attempts,
      lastState,
      status: result.value?.status ?? null
    };
  };

  /** Submits and waits. Null when the submission started no command to wait for. */
  run = async (
    kind: CommandKind,
    submit: () => Promise<CommandResponse>
  ): Promise<CommandResult | null> => {
    const command = this.toCommand(kind, await submit());
    if (!command) {
      return null;
    }

    return this.wait(command);
  };
}
