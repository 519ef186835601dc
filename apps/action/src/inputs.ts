import * as core from '@actions/core';
import { INPUT_NAMES, type RawInputs } from '@commitguard/core';

export function readActionInputs(): RawInputs {
  const inputs: RawInputs = {};
  for (const name of INPUT_NAMES) {
    inputs[name] = core.getInput(name);
  }
  return inputs;
}
