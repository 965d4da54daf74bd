/**
 * Concrete compilation sequences
 */

import { pass as parsingPass } from "../parser/pass.js";
import { pass as resolutionPass } from "../resolver/pass.js";
import { pass as typeCheckingPass } from "../typechecker/pass.js";
import { pass as loopExtractionPass } from "../cfg/pass.js";

import { buildSequence } from "./sequence.js";

export interface SequenceInput {
  source: string;
  overlookResolutionErrors: boolean;
}

// Syntax only
export const astSequence = buildSequence<SequenceInput>().then(parsingPass);

// Parsing, name resolution and type checking
export const checkSequence = astSequence
  .then(resolutionPass)
  .then(typeCheckingPass);

// The checked program with its loops turned into procedures, checked again
export const extractionSequence = checkSequence
  .then(loopExtractionPass)
  .then(resolutionPass)
  .then(typeCheckingPass);
