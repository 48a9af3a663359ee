#!/usr/bin/env node
'use strict';

import * as fs from 'fs';
import _ from './lodash-mixins';

import type Program from './Program';
import type State from './State';
import StateGraph from './state-diagram/StateGraph';
import { loadConfig, resolveConfig } from './config';
import type { RunConfig } from './config';
import { checkReachable } from './parser-utils';
import TMSpecError from './TMSpecError';
import { report, runAll } from './runner';
import * as reverse from './machines/reverse';
import * as anbncn from './machines/anbncn';

interface Demo {
  title: string;
  program: Program;
  start: State;
  examples: string[];
}

export const demos: { [name: string]: Demo } = {
  reverse: { title: 'Input reversal machine:', ...reverse },
  anbncn: { title: 'Acceptor of { a^n b^n c^n : n >= 0 }:', ...anbncn },
};

const USAGE = 'usage: tape-machine [' + _.keys(demos).join('|') + '] [--config <file.yml>] [--graph] [input...]';

// errors fs raises for a path: ENOENT, EACCES, EISDIR, ...
function isFileError (e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && _.isString(_.get(e, 'code'));
}

function describeGraph (program: Program): string[] {
  let graph = new StateGraph(program);
  graph.layout();
  return _.map(graph.getEdges(), (edge) =>
    edge.source.label + ' -> ' + edge.target.label + ': ' + edge.labels.join(' ; '));
}

export function main (argv: string[]): number {
  let args = argv.slice();
  let config: RunConfig = resolveConfig({});
  let graph = false;

  let configAt = args.indexOf('--config');
  if (configAt >= 0) {
    let file = args[configAt + 1];
    if (file === undefined) { console.error(USAGE); return 2; }
    try {
      config = loadConfig(fs.readFileSync(file, 'utf8'));
    } catch (e) {
      if (!(e instanceof TMSpecError) && !isFileError(e)) { throw e; }
      console.error('cannot use config ' + file + ': ' + e.message);
      console.error(USAGE);
      return 2;
    }
    args.splice(configAt, 2);
  }
  if (_.contains(args, '--graph')) {
    graph = true;
    _.pull(args, '--graph');
  }

  let [name, ...inputs] = args;
  let selected = name === undefined ? _.keys(demos) : [name];
  if (!_.every(selected, (n) => _.has(demos, n))) { console.error(USAGE); return 2; }

  _.forEach(selected, (n, i) => {
    let demo = demos[n];
    let lines = [demo.title, _.repeat('=', demo.title.length)];
    if (i > 0) lines.unshift('');
    if (graph) lines = lines.concat(describeGraph(demo.program));
    checkReachable(demo.program);
    let tapes = _.isEmpty(inputs) ? demo.examples : inputs;
    lines = lines.concat(report(runAll(demo.program, demo.start, tapes, config)));
    _.forEach(lines, (line) => console.log(line));
  });
  return 0;
}

if (require.main === module) {
  process.exitCode = main(process.argv.slice(2));
}
