/**
 * tollgate demo — Run the end-to-end scenario
 *
 * Usage:
 *   tollgate demo [--events] [--home <dir>]
 *
 * Runs the scenario on an in-process host and prints each step, every
 * committed event and every dispatch decision. With --events the events
 * and decisions are also appended to <home>/logs/events.jsonl and
 * <home>/logs/decisions.jsonl.
 */

import { Command } from 'commander';
import { FileEventSink, MemoryEventSink } from '@tollgate/runtime-host';
import { JsonlDecisionSink, MemoryDecisionSink } from '@tollgate/kernel';
import { runDemoScenario } from '../demo/scenario.js';
import { openHome } from '../home.js';
import { formatDecision, formatEvent, formatStep } from '../output/format.js';
import { decisionColor, outcomeColor, t } from '../output/theme.js';

export const demoCommand = new Command('demo')
  .description('Run the end-to-end protocol scenario in process')
  .option('--events', 'Also append events and decisions to the home logs directory')
  .option('--home <dir>', 'Tollgate home directory (with --events)')
  .action((options: { events?: boolean; home?: string }) => {
    const events = new MemoryEventSink();
    const decisions = new MemoryDecisionSink();
    const report = runDemoScenario({ eventSink: events, decisionSink: decisions });

    // eslint-disable-next-line no-console
    console.log(t.white('\n─── Scenario ────────────────────────────────────────'));
    report.steps.forEach((step, i) => {
      // eslint-disable-next-line no-console
      console.log(outcomeColor(step.outcome)(formatStep(step, i)));
    });

    // eslint-disable-next-line no-console
    console.log(t.white('\n─── Events ──────────────────────────────────────────'));
    for (const entry of events.all()) {
      // eslint-disable-next-line no-console
      console.log(t.text(formatEvent(entry)));
    }

    // eslint-disable-next-line no-console
    console.log(t.white('\n─── Decisions ───────────────────────────────────────'));
    for (const entry of decisions.entries) {
      // eslint-disable-next-line no-console
      console.log(decisionColor(entry.decision)(formatDecision(entry)));
    }

    if (options.events === true) {
      const stateIO = openHome(options.home);
      const eventLog = new FileEventSink(stateIO);
      const decisionLog = new JsonlDecisionSink(stateIO);
      events.all().forEach((entry) => eventLog.append(entry));
      decisions.entries.forEach((entry) => decisionLog.append(entry));
      // eslint-disable-next-line no-console
      console.log(t.muted(`\n${events.all().length} events and ${decisions.entries.length} decisions appended to logs/`));
    }
  });
