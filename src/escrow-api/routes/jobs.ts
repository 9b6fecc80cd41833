import { Router } from 'express';
import { callerOf, requireCaller } from '../middleware/index';
import {
  jobIdParamSchema,
  listJobsQuerySchema,
  postJobBodySchema,
  submitWorkBodySchema,
  updateJobBodySchema,
} from '../schemas';
import type { EscrowServices } from '../services';

export function jobsRouter({ ledger, events }: EscrowServices): Router {
  const router = Router();

  // List jobs, optionally filtered
  router.get('/', async (req, res) => {
    const filter = listJobsQuerySchema.parse(req.query);
    const rows = await ledger.listJobs(filter);
    res.json({ success: true, data: rows });
  });

  router.get('/:id', async (req, res) => {
    const id = jobIdParamSchema.parse(req.params.id);
    const job = await ledger.getJob(id);
    if (!job) {
      res.status(404).json({ success: false, error: `Job ${id} does not exist`, code: 'JobNotFound' });
      return;
    }
    res.json({ success: true, data: job });
  });

  router.get('/:id/events', async (req, res) => {
    const id = jobIdParamSchema.parse(req.params.id);
    res.json({ success: true, data: await events.eventsForJob(id) });
  });

  // Post a job with its escrow deposit
  router.post('/', requireCaller, async (req, res) => {
    const body = postJobBodySchema.parse(req.body);
    const jobId = await ledger.postJob(callerOf(req), body);
    res.status(201).json({ success: true, data: { jobId } });
  });

  router.put('/:id', requireCaller, async (req, res) => {
    const id = jobIdParamSchema.parse(req.params.id);
    const body = updateJobBodySchema.parse(req.body);
    await ledger.updateJob(callerOf(req), id, body);
    res.json({ success: true, data: await ledger.getJob(id) });
  });

  router.post('/:id/cancel', requireCaller, async (req, res) => {
    const id = jobIdParamSchema.parse(req.params.id);
    await ledger.cancelJob(callerOf(req), id);
    res.json({ success: true, data: await ledger.getJob(id) });
  });

  router.post('/:id/submit', requireCaller, async (req, res) => {
    const id = jobIdParamSchema.parse(req.params.id);
    const { proofHash } = submitWorkBodySchema.parse(req.body);
    await ledger.submitWork(callerOf(req), id, proofHash);
    res.json({ success: true, data: await ledger.getJob(id) });
  });

  router.post('/:id/approve', requireCaller, async (req, res) => {
    const id = jobIdParamSchema.parse(req.params.id);
    await ledger.approveWork(callerOf(req), id);
    res.json({ success: true, data: await ledger.getJob(id) });
  });

  router.post('/:id/reject', requireCaller, async (req, res) => {
    const id = jobIdParamSchema.parse(req.params.id);
    await ledger.rejectWork(callerOf(req), id);
    res.json({ success: true, data: await ledger.getJob(id) });
  });

  return router;
}
