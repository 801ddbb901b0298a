#!/usr/bin/env -S node --import tsx
/**
 * bin/tollgate.ts — Entry point for the `tollgate` CLI command.
 *
 *   tollgate --help
 *   tollgate selector <signature...>
 *   tollgate keygen [--force]
 *   tollgate credential <integration> <implementation> <admin>
 *   tollgate demo [--events]
 *   tollgate log [events|decisions]
 */

import { program } from '../commands/index.js'

program.parse()
