import { Router } from 'express';
import { ESCROW_CORE_VERSION } from '@core/index';

const router = Router();

router.get('/health', (_req, res) => {
  res.json({
    success: true,
    data: { status: 'ok', version: ESCROW_CORE_VERSION, timestamp: new Date().toISOString() },
  });
});

export default router;
