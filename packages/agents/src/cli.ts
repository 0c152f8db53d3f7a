#!/usr/bin/env node
// Brokerage simulator — CLI
//
// Usage:
//   broker-sim run scenarios/ipo-and-market.json                 # replay a scenario
//   broker-sim run scenario.json --cycles 3 --out trace.json      # 3 passes, export the trace
//   broker-sim run scenario.json --config broker.json --hop-limit 2
//   broker-sim topology                                           # print roster and edges
//   broker-sim --help                                             # usage

import 'dotenv/config';
import { writeFileSync } from 'node:fs';
import { loadBrokerConfig, loadScenario, createBrokerAgent } from '../config/broker-config.js';
import { ScenarioRunner } from '../orchestrator/scenario-runner.js';
import type { BrokerAgent } from '../orchestrator/broker-agent.js';
import type { Decision, TraceRecord } from '../types/coordination.js';
import { ROLE_LABELS } from '../types/roles.js';
import { ConfigurationError, errorMessage } from '../utils/errors.js';

// ── ANSI helpers (no chalk dependency) ──────────────────────────────

const isTTY = process.stdout.isTTY ?? false;

const ansi = {
  reset: isTTY ? '\x1b[0m' : '',
  bold: isTTY ? '\x1b[1m' : '',
  dim: isTTY ? '\x1b[2m' : '',
  cyan: isTTY ? '\x1b[36m' : '',
  green: isTTY ? '\x1b[32m' : '',
  yellow: isTTY ? '\x1b[33m' : '',
  red: isTTY ? '\x1b[31m' : '',
  magenta: isTTY ? '\x1b[35m' : '',
};

function c(color: keyof typeof ansi, text: string): string {
  return `${ansi[color]}${text}${ansi.reset}`;
}

const OUTCOME_COLORS: Record<Decision['outcome'], keyof typeof ansi> = {
  consensus: 'green',
  priority: 'green',
  escalated: 'cyan',
  veto: 'magenta',
  no_action: 'dim',
  unresolved: 'yellow',
  aborted: 'red',
};

function describeDecision(decision: Decision): string {
  switch (decision.outcome) {
    case 'consensus':
      return `agreed by ${decision.roles.join(', ')}`;
    case 'veto':
    case 'priority':
    case 'escalated':
      return `${decision.opinion.role} ${JSON.stringify(decision.opinion.payload)}`;
    case 'unresolved':
    case 'no_action':
    case 'aborted':
      return decision.reason;
  }
}

function parsePositiveInt(flag: string, value: string | undefined): number {
  const n = Number(value);
  if (value === undefined || !Number.isInteger(n) || n < 1) {
    throw new ConfigurationError(`Invalid ${flag}`, [`expected a positive integer, got ${value ?? '(nothing)'}`]);
  }
  return n;
}

// ── CLI class ───────────────────────────────────────────────────────

class BrokerCli {
  async start(): Promise<void> {
    const rawArgs = process.argv.slice(2);

    if (rawArgs.includes('--help') || rawArgs.includes('-h') || rawArgs.length === 0) {
      this.printHelp();
      return;
    }

    const [command, ...rest] = rawArgs;
    switch (command) {
      case 'run':
        await this.handleRun(rest);
        break;
      case 'topology':
        this.handleTopology(rest);
        break;
      case 'help':
        this.printHelp();
        break;
      default:
        console.error(`Unknown command: ${command}\n`);
        this.printHelp();
        process.exitCode = 1;
    }
  }

  // ── Subcommand: run ─────────────────────────────────────────────

  private async handleRun(args: string[]): Promise<void> {
    let scenarioPath: string | undefined;
    let configPath: string | undefined;
    let cycles: number | undefined;
    let hopLimit: number | undefined;
    let outPath: string | undefined;

    for (let i = 0; i < args.length; i++) {
      const arg = args[i];
      if (arg === '--config') {
        configPath = args[++i];
      } else if (arg === '--cycles') {
        cycles = parsePositiveInt('--cycles', args[++i]);
      } else if (arg === '--hop-limit') {
        hopLimit = parsePositiveInt('--hop-limit', args[++i]);
      } else if (arg === '--out') {
        outPath = args[++i];
      } else if (!scenarioPath) {
        scenarioPath = arg;
      } else {
        throw new ConfigurationError('Unexpected argument', [arg]);
      }
    }

    if (!scenarioPath) {
      throw new ConfigurationError('No scenario file given', ['usage: broker-sim run <scenario.json>']);
    }

    const settings = loadBrokerConfig(configPath);
    const scenario = loadScenario(scenarioPath);
    const broker = createBrokerAgent(settings, hopLimit !== undefined ? { hopLimit } : {});
    const runner = new ScenarioRunner(broker);
    const passes = cycles ?? scenario.num_cycles ?? settings.num_cycles;

    console.log(`\n  ${c('bold', broker.name)} ${c('dim', `— scenario "${scenario.name}"`)}`);
    console.log(`  ${c('dim', `Events: ${scenario.events.length} | Passes: ${passes} | Hop limit: ${broker.network.hopLimit}`)}\n`);

    const onSigint = (): void => {
      process.stderr.write(`  ${c('yellow', 'Stopping after the current hop level...')}\n`);
      runner.stop();
    };
    process.once('SIGINT', onSigint);

    const trace = await runner.run(scenario, passes).finally(() => process.off('SIGINT', onSigint));

    for (const record of trace.records) this.printRecord(record);

    const summary = trace.summary();
    const counts = Object.entries(summary.outcomes)
      .filter(([, n]) => n > 0)
      .map(([outcome, n]) => `${outcome} ${n}`)
      .join(' | ');
    console.log(`\n  ${c('green', '✓')} ${c('bold', 'Complete')} ${c('dim', `— ${summary.cycles} cycles`)}`);
    console.log(`  ${c('dim', `Outcomes: ${counts || 'none'}`)}`);
    console.log(`  ${c('dim', `Failures: ${summary.failures} | Dropped messages: ${summary.dropped}`)}`);
    if (runner.warnings.length > 0) {
      console.log(`  ${c('yellow', `Warnings: ${runner.warnings.length}`)}`);
    }

    if (outPath) {
      writeFileSync(outPath, JSON.stringify(trace.toJSON(), null, 2));
      console.log(`  ${c('dim', `Trace written to ${outPath}`)}`);
    }
    console.log();
  }

  private printRecord(record: TraceRecord): void {
    const { decision, event } = record;
    const cycle = c('dim', `#${String(record.cycle).padStart(3, ' ')}`);
    const label = c(OUTCOME_COLORS[decision.outcome], decision.outcome.padEnd(10, ' '));
    const owner = decision.owner ? c('dim', `[${decision.owner}]`) : '';
    console.log(`  ${cycle} ${c('cyan', event.id.padEnd(20, ' '))} ${label} ${describeDecision(decision)} ${owner}`);
  }

  // ── Subcommand: topology ────────────────────────────────────────

  private handleTopology(args: string[]): void {
    const configIdx = args.indexOf('--config');
    const configPath = configIdx >= 0 ? args[configIdx + 1] : undefined;
    const broker: BrokerAgent = createBrokerAgent(loadBrokerConfig(configPath));
    const { topology } = broker.network;

    console.log(`\n  ${c('bold', `${topology.roles.length} departments`)} ${c('dim', `(hop limit ${broker.network.hopLimit})`)}\n`);
    for (const role of topology.roles) {
      const targets = topology.successors(role);
      console.log(`    ${c('cyan', role.padEnd(20, ' '))} ${c('dim', ROLE_LABELS[role])}`);
      console.log(`      ${c('dim', '→')} ${targets.length > 0 ? targets.join(', ') : c('dim', '(none)')}`);
    }
    if (topology.hasCycle()) {
      console.log(`\n  ${c('dim', 'Peer edges form cycles; propagation is capped by the hop limit.')}`);
    }
    console.log();
  }

  // ── Help ────────────────────────────────────────────────────────

  printHelp(): void {
    console.log(`
  ${c('bold', 'broker-sim')} — composite brokerage agent simulator

  ${c('bold', 'Usage:')}
    broker-sim run <scenario.json> [options]   Replay a scenario through the broker
    broker-sim topology [--config <file>]      Show departments and routing edges
    broker-sim help                            Show this help

  ${c('bold', 'Run options:')}
    --config <file>        Broker configuration (default: BROKER_CONFIG or built-in)
    --cycles <n>           Number of passes over the scenario
    --hop-limit <n>        Maximum internal hops per event
    --out <file>           Write the trace as JSON

  ${c('bold', 'Environment:')}
    BROKER_CONFIG                 Path to a broker configuration file
    BROKER_HOP_LIMIT              Hop limit override
    BROKER_DECISION_TIMEOUT_MS    Per-call decision timeout
    BROKER_NUM_CYCLES             Default number of passes
    BROKER_LOG_LEVEL              debug | info | warn | error | silent (default: info)
`);
  }
}

// ── Entry point ─────────────────────────────────────────────────────

const cli = new BrokerCli();
cli.start().catch((err) => {
  const prefix = err instanceof ConfigurationError ? 'Configuration error:' : 'Fatal:';
  console.error(`${c('red', prefix)} ${errorMessage(err)}`);
  process.exit(1);
});
