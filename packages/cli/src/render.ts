// packages/cli/src/render.ts — Terminal rendering for engine events

import type { EngineEvent, RunResult, SessionStatus } from '@taskpilot/core';
import chalk from 'chalk';
import ora from 'ora';
import type { Ora } from 'ora';

const statusColors: Record<SessionStatus, (text: string) => string> = {
  running: chalk.cyan,
  success: chalk.green,
  stuck: chalk.yellow,
  lost: chalk.yellow,
  error: chalk.red,
};

function firstLine(text: string): string {
  return text.split('\n')[0];
}

function seconds(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}

/** Plain-text line(s) for an event; null for events shown only through the spinner. */
export function formatEvent(event: EngineEvent): string | null {
  switch (event.type) {
    case 'session.started':
      return `━━━ Session ${event.sessionId} ━━━\nGoal: ${event.goal}\nStep budget: ${event.stepBudget}`;

    case 'budget.revised': {
      const checkpoints = event.checkpoints.length > 0 ? `, checkpoints at ${event.checkpoints.join(', ')}` : '';
      return `  Plan: ${event.stepBudget} steps (was ${event.previous})${checkpoints}`;
    }

    case 'step.started':
      return `▶ Step ${event.stepNumber}/${event.stepBudget}`;

    case 'step.decided':
      return `  ${event.thought}\n    → ${event.instruction} [${event.source}, ${event.status}]`;

    case 'step.verified':
      return event.verification.achieved
        ? `  ✓ verified: ${event.verification.reason}`
        : `  ✗ not verified: ${event.verification.reason}`;

    case 'step.completed':
      return event.outcome === 'Pass'
        ? `  ✓ Step ${event.stepNumber} (${seconds(event.durationMs)})`
        : `  ✗ Step ${event.stepNumber}: ${firstLine(event.failureDetail ?? 'failed')}`;

    case 'checkpoint.captured':
      return `  ◆ Checkpoint saved: ${event.path}`;

    case 'session.finished':
      return `━━━ ${event.status} after ${event.steps} step(s), ${seconds(event.durationMs)} ━━━\n  ${event.reason}`;

    case 'postmortem.created':
      return null;
  }
}

function colorFor(event: EngineEvent): (text: string) => string {
  switch (event.type) {
    case 'session.started':
    case 'budget.revised':
    case 'checkpoint.captured':
      return chalk.gray;
    case 'step.started':
      return chalk.blue;
    case 'step.verified':
      return event.verification.achieved ? chalk.green : chalk.red;
    case 'step.completed':
      return event.outcome === 'Pass' ? chalk.gray : chalk.red;
    case 'session.finished':
      return statusColors[event.status];
    default:
      return chalk.white;
  }
}

/**
 * Prints events as they arrive. On a TTY the running step is shown with a spinner
 * that settles when the step record is written.
 */
export class EventRenderer {
  private spinner: Ora | null = null;

  constructor(private readonly interactive = process.stderr.isTTY === true) {}

  render(event: EngineEvent): void {
    const text = formatEvent(event);

    if (event.type === 'step.started' && this.interactive && text) {
      this.stop();
      this.spinner = ora({ text: chalk.blue(text), stream: process.stderr }).start();
      return;
    }
    if (event.type === 'step.completed' && this.spinner) {
      const line = text ?? '';
      if (event.outcome === 'Pass') {
        this.spinner.succeed(chalk.gray(line.trim()));
      } else {
        this.spinner.fail(chalk.red(line.trim()));
      }
      this.spinner = null;
      return;
    }
    if (!text) return;

    const print = () => console.log(colorFor(event)(text));
    if (this.spinner) {
      // keep the spinner on its own line
      this.spinner.clear();
      print();
      this.spinner.render();
    } else {
      print();
    }
  }

  /** Stop a spinner left running by a step that ended without a record. */
  stop(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }
}

export function printRunSummary(result: RunResult): void {
  const { session, postMortem } = result;
  const color = statusColors[session.status];
  console.log(chalk.bold('\nRun Summary'));
  console.log(chalk.gray('-'.repeat(40)));
  console.log(`  Session:  ${chalk.white(session.id)}`);
  console.log(`  Status:   ${color(session.status)}`);
  console.log(`  Reason:   ${session.terminalReason ?? ''}`);
  console.log(`  Steps:    ${chalk.cyan(`${result.steps.length}/${session.stepBudget}`)}`);
  console.log(`  Duration: ${chalk.cyan(seconds(result.durationMs))}`);
  if (postMortem.validation) {
    const verdict = postMortem.validation.achieved ? chalk.green('achieved') : chalk.red('not achieved');
    console.log(`  Goal:     ${verdict} (${postMortem.validation.reason})`);
  }
  console.log(chalk.gray('-'.repeat(40)));
  console.log(postMortem.optimizedPrompt);
}
