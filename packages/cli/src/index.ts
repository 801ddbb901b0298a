/**
 * @tollgate/cli
 *
 * Operator command-line interface. The `tollgate` binary lives in
 * src/bin/tollgate.ts; this module exposes the program and the pieces it
 * is built from.
 */

export { program } from './commands/index.js';
export type { DemoReport, DemoScenarioOptions, DemoStep, StepOutcome } from './demo/scenario.js';
export { runDemoScenario } from './demo/scenario.js';
export type { RegistrarKey, RegistrarKeyFile } from './keys/registrar-key.js';
export { createRegistrarKey, isRegistrarKeyFile, loadRegistrarKey, REGISTRAR_KEY_FILE } from './keys/registrar-key.js';
export type { LogFilter, LogKind } from './commands/log.js';
export { selectLogLines } from './commands/log.js';
export { formatDecision, formatEvent, formatStep, shortHex } from './output/format.js';
