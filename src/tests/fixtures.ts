import { Choice, Model } from '../types.js';

/**
 * Small key used across tests: one characteristic leading to a second,
 * three species.
 */
export const BEETLE_KEY = {
  start: '1',
  data: {
    '1': [
      { description: 'head red', next: '2' },
      { description: 'head black', target: ['SpeciesA', null] }
    ],
    '2': [
      { description: 'legs long', target: ['SpeciesB', 'https://example.org/b'] },
      { description: 'legs short', target: ['SpeciesC', null] }
    ]
  }
};

/**
 * Build a Model directly, bypassing parsing
 */
export function modelOf(start: string, nodes: Record<string, Choice[]>): Model {
  return { start, nodes: new Map(Object.entries(nodes)) };
}
