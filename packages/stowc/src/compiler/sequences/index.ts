/**
 * Concrete compilation sequences for different targets
 */

import { pass as parsingPass } from "#parser";
import { pass as checkingPass } from "#checker";
import { pass as derivePass } from "#derive";
import { pass as layoutPass } from "#layout";

import { Sequence } from "../sequence.js";

export interface CompileInput {
  source: string;
  sourcePath?: string;
  /** Type to render layout metadata for; overrides the definitions' `root` */
  root?: string;
  /** Key of the root cell; overrides the definitions' `rootKey` */
  rootKey?: number;
  storageMapPrefix?: string;
}

// Descriptors only (just parsing)
export const descriptorsSequence = Sequence.of<CompileInput>().then(
  "parse",
  parsingPass,
);

// Resolved types
export const typesSequence = descriptorsSequence.then("check", checkingPass);

// Packedness, hints and codecs of every type
export const deriveSequence = typesSequence.then("derive", derivePass);

// Layout metadata
export const layoutSequence = deriveSequence.then("layout", layoutPass);

export const targetSequences = {
  descriptors: descriptorsSequence,
  types: typesSequence,
  derive: deriveSequence,
  layout: layoutSequence,
} as const;

export type Target = keyof typeof targetSequences;
export type TargetSequence<T extends Target> = (typeof targetSequences)[T];
export type TargetOutput<T extends Target> = Sequence.Output<TargetSequence<T>>;
