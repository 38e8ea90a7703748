import { Choice, KeyWarning, Model, SpeciesTarget } from './types.js';
import { DanglingReferenceError, MalformedModelError } from './errors.js';

/**
 * Options for parsing a model file
 */
export interface ParseModelOptions {
  /** Name used in error messages (usually the file path) */
  source?: string;
  /** Treat a `next` that names no characteristic as fatal (default: false) */
  strict?: boolean;
}

/**
 * Result of parsing a model file
 */
export interface ParseModelResult {
  model: Model;
  warnings: KeyWarning[];
}

/**
 * Summary printed by the `info` command
 */
export interface ModelInfo {
  start: string;
  characteristics: number;
  choices: number;
  species: number;
  /** Characteristics with no choice leading to another characteristic */
  leaves: number;
  /** Choices with neither `next` nor `target` */
  unknownChoices: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function parseTarget(raw: unknown, where: string, source: string): SpeciesTarget | undefined {
  if (raw === null || raw === undefined) {
    return undefined;
  }
  if (!Array.isArray(raw) || typeof raw[0] !== 'string' || raw[0].trim() === '') {
    throw new MalformedModelError(`${where}: target must be [label, url|null]`, source);
  }
  const label = raw[0].trim();
  const url = optionalString(raw[1]);
  return url ? { label, url } : { label };
}

function parseChoice(raw: unknown, where: string, source: string): Choice {
  if (!isRecord(raw)) {
    throw new MalformedModelError(`${where}: choice must be an object`, source);
  }
  const rawDescription = raw['description'];
  let description = '';
  if (typeof rawDescription === 'string') {
    description = rawDescription;
  } else if (rawDescription !== undefined && rawDescription !== null) {
    throw new MalformedModelError(`${where}: description must be a string`, source);
  }
  const rawNext = raw['next'];
  if (rawNext !== undefined && rawNext !== null && typeof rawNext !== 'string') {
    throw new MalformedModelError(`${where}: next must be a string or null`, source);
  }
  const next = optionalString(rawNext);
  const target = parseTarget(raw['target'], where, source);
  if (next && target) {
    throw new MalformedModelError(`${where}: choice has both next and target`, source);
  }

  const choice: Choice = { description };
  if (next) choice.next = next;
  if (target) choice.target = target;
  return choice;
}

/**
 * Validate a decoded model file and turn it into a Model.
 *
 * Shape errors and a bad start id are fatal. A `next` naming no
 * characteristic is reported and the choice becomes an unknown choice,
 * unless `strict` is set.
 */
export function parseModel(raw: unknown, options: ParseModelOptions = {}): ParseModelResult {
  const { source = 'model', strict = false } = options;
  const warnings: KeyWarning[] = [];

  if (!isRecord(raw)) {
    throw new MalformedModelError('model must be a JSON object', source);
  }
  const start = raw['start'];
  if (typeof start !== 'string' || start === '') {
    throw new MalformedModelError('missing "start" key', source);
  }
  const data = raw['data'];
  if (!isRecord(data)) {
    throw new MalformedModelError('missing "data" object', source);
  }

  const nodes = new Map<string, Choice[]>();
  for (const [nodeId, rawChoices] of Object.entries(data)) {
    if (!Array.isArray(rawChoices)) {
      throw new MalformedModelError(`characteristic ${nodeId}: choices must be a list`, source);
    }
    nodes.set(nodeId, rawChoices.map((c, i) => parseChoice(c, `characteristic ${nodeId}, choice ${i}`, source)));
  }

  if (!nodes.has(start)) {
    throw new MalformedModelError(`start characteristic "${start}" is not defined`, source);
  }

  for (const [nodeId, choices] of nodes) {
    choices.forEach((choice, index) => {
      if (choice.next !== undefined && !nodes.has(choice.next)) {
        const message = `characteristic ${nodeId}, choice ${index}: next "${choice.next}" is not defined`;
        if (strict) {
          throw new DanglingReferenceError(message, choice.next);
        }
        warnings.push({ kind: 'DanglingReference', message, subject: choice.next });
        delete choice.next;
      }
      if (choice.target && nodes.has(choice.target.label)) {
        warnings.push({
          kind: 'NameCollision',
          message: `species "${choice.target.label}" has the same name as a characteristic`,
          subject: choice.target.label
        });
      }
    });
  }

  return { model: { start, nodes }, warnings };
}

/**
 * Every target label in model order, each once
 */
export function allSpecies(model: Model): string[] {
  const labels = new Set<string>();
  for (const choices of model.nodes.values()) {
    for (const choice of choices) {
      if (choice.target) {
        labels.add(choice.target.label);
      }
    }
  }
  return Array.from(labels);
}

/**
 * Look up the target behind a characteristic choice
 */
export function getTarget(model: Model, nodeId: string, choiceIndex: number): SpeciesTarget | undefined {
  return model.nodes.get(nodeId)?.[choiceIndex]?.target;
}

export function isLeaf(choices: readonly Choice[]): boolean {
  return choices.every(choice => choice.next === undefined);
}

export function modelInfo(model: Model): ModelInfo {
  let choices = 0;
  let leaves = 0;
  let unknownChoices = 0;
  for (const list of model.nodes.values()) {
    choices += list.length;
    if (isLeaf(list)) leaves++;
    unknownChoices += list.filter(c => c.next === undefined && c.target === undefined).length;
  }
  return {
    start: model.start,
    characteristics: model.nodes.size,
    choices,
    species: allSpecies(model).length,
    leaves,
    unknownChoices
  };
}
