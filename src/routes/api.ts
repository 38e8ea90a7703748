import { Router, Request, Response, NextFunction } from 'express';
import { KeySite } from '../loader.js';
import { CycleDetectedError, DanglingReferenceError } from '../errors.js';
import { getTarget } from '../model.js';

/**
 * Create read-only API routes over a loaded key
 */
export function createApiRoutes(site: KeySite): Router {
  const router = Router();
  const { model, index, closure, catalog, annotator } = site;

  /**
   * GET /api/nodes
   * List all characteristics
   */
  router.get('/nodes', (_req: Request, res: Response) => {
    const nodes = Array.from(model.nodes.entries()).map(([id, choices]) => ({
      id,
      choices: choices.length,
      start: id === model.start
    }));
    res.json(nodes);
  });

  /**
   * GET /api/nodes/:id
   * A characteristic with its navigation and species closure
   */
  router.get('/nodes/:id', (req: Request, res: Response) => {
    const { id } = req.params;
    const choices = model.nodes.get(id);

    if (!choices) {
      res.status(404).json({ error: `Characteristic not found: ${id}` });
      return;
    }

    res.json({
      id,
      choices,
      children: index.children(id),
      parents: index.parents(id, 'characteristic'),
      ancestorChain: index.ancestorChain(id, 'characteristic'),
      ancestors: index.ancestors(id, 'characteristic'),
      closure: Array.from(closure.closureOf(id)).sort()
    });
  });

  /**
   * GET /api/species
   * List all species, sorted
   */
  router.get('/species', (_req: Request, res: Response) => {
    res.json(closure.allSpecies());
  });

  /**
   * GET /api/species/:label
   * The characteristic chain leading to a species
   */
  router.get('/species/:label', (req: Request, res: Response) => {
    const { label } = req.params;

    if (!index.has(label, 'species')) {
      res.status(404).json({ error: `Species not found: ${label}` });
      return;
    }

    const steps = index.ancestorLinks(label, 'species');
    const last = steps[steps.length - 1];
    const target = last ? getTarget(model, last.parent, last.choiceIndex) : undefined;

    res.json({
      label,
      url: target?.url ?? null,
      ancestorChain: index.ancestorChain(label, 'species'),
      steps
    });
  });

  /**
   * GET /api/terms
   * All glossary terms in matching order
   */
  router.get('/terms', (_req: Request, res: Response) => {
    res.json(catalog.allTerms());
  });

  /**
   * GET /api/terms/:value
   * Entries explaining one term
   */
  router.get('/terms/:value', (req: Request, res: Response) => {
    const { value } = req.params;
    const term = catalog.getTerm(value);

    if (!term) {
      res.status(404).json({ error: `Term not found: ${value}` });
      return;
    }

    res.json({ term, entries: catalog.entriesFor(value) });
  });

  /**
   * POST /api/annotate
   * Body: { text: string, pageId?: string }
   */
  router.post('/annotate', (req: Request, res: Response) => {
    const body: unknown = req.body;
    const text = typeof body === 'object' && body !== null && 'text' in body ? body.text : undefined;
    const pageId = typeof body === 'object' && body !== null && 'pageId' in body ? body.pageId : undefined;

    if (typeof text !== 'string') {
      res.status(400).json({ error: 'Body field "text" is required' });
      return;
    }

    res.json(annotator.annotate(text, { pageId: typeof pageId === 'string' ? pageId : undefined }));
  });

  router.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    if (err instanceof DanglingReferenceError) {
      res.status(404).json({ error: err.message });
    } else if (err instanceof CycleDetectedError) {
      res.status(409).json({ error: err.message, chain: err.chain });
    } else {
      res.status(500).json({ error: err instanceof Error ? err.message : String(err) });
    }
  });

  return router;
}
