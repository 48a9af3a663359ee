'use strict';

import * as jsyaml from "js-yaml";
import * as yup from 'yup';
import * as util from "util";

import { validate } from './parser';
import TMSpecError from './TMSpecError';

export let RunConfigSchema = yup.object({
  // null runs to completion, however long that takes
  maxSteps: yup.number().integer().positive().nullable().default(null),
  trace: yup.boolean().default(false),
})
  .from('["max steps"]', 'maxSteps')
;

export type RunConfig = yup.InferType<typeof RunConfigSchema>;

export function resolveConfig (obj: unknown = {}): RunConfig {
  return validate(RunConfigSchema, obj ?? {}, 'Invalid configuration');
}

/**
 * Read run options from YAML, e.g.
 *
 *     max steps: 10000
 *     trace: true
 */
export function loadConfig (str: string): RunConfig {
  let obj: unknown;
  try {
    obj = jsyaml.load(str);
  } catch (e) {
    if (e instanceof jsyaml.YAMLException)
      throw new TMSpecError('Configuration is not valid YAML', {
        validationErrors: [e.message]
      });
    throw e;
  }
  let config = resolveConfig(obj);
  if (config.trace) console.log(util.inspect(config, false, null, false));
  return config;
}
