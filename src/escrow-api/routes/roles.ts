import { Router } from 'express';
import { isSelfServiceRole } from '@core/access-control';
import { EscrowError } from '@core/errors';
import { callerOf, requireCaller } from '../middleware/index';
import { adminBodySchema, roleBodySchema, roleParamSchema } from '../schemas';
import type { EscrowServices } from '../services';

export function rolesRouter({ roles }: EscrowServices): Router {
  const router = Router();

  // Roles held by an identity
  router.get('/:identity', (req, res) => {
    res.json({
      success: true,
      data: { identity: req.params.identity, roles: roles.rolesOf(req.params.identity) },
    });
  });

  // Self-service Client / Freelancer standing
  router.post('/self', requireCaller, (req, res) => {
    const { role } = roleBodySchema.parse(req.body);
    if (!isSelfServiceRole(role)) {
      throw new EscrowError('Unauthorized', `Role '${role}' cannot be self-granted`);
    }
    const caller = callerOf(req);
    roles.grantSelf(caller, role);
    res.status(201).json({ success: true, data: { identity: caller, roles: roles.rolesOf(caller) } });
  });

  router.delete('/self/:role', requireCaller, (req, res) => {
    const role = roleParamSchema.parse(req.params.role);
    if (!isSelfServiceRole(role)) {
      throw new EscrowError('Unauthorized', `Role '${role}' cannot be self-revoked`);
    }
    const caller = callerOf(req);
    roles.revokeSelf(caller, role);
    res.json({ success: true, data: { identity: caller, roles: roles.rolesOf(caller) } });
  });

  // Administrator path
  router.post('/admins', requireCaller, (req, res) => {
    const { identity } = adminBodySchema.parse(req.body);
    roles.grantAdmin(callerOf(req), identity);
    res.status(201).json({ success: true, data: { admins: roles.admins() } });
  });

  router.delete('/admins/:identity', requireCaller, (req, res) => {
    roles.revokeAdmin(callerOf(req), req.params.identity);
    res.json({ success: true, data: { admins: roles.admins() } });
  });

  return router;
}
