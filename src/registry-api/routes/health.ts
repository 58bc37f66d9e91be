import { Router } from 'express';
import os from 'os';
import type { HealthRecord } from '@shared/types';

function hostAddress(): string {
  for (const entries of Object.values(os.networkInterfaces())) {
    const external = entries?.find((entry) => entry.family === 'IPv4' && !entry.internal);
    if (external) return external.address;
  }
  return '127.0.0.1';
}

export function makeHealth(echo: string | null, pathEcho: string | null): HealthRecord {
  return {
    status: 200,
    status_message: 'OK',
    timestamp: new Date().toISOString(),
    ip_address: hostAddress(),
    echo,
    path_echo: pathEcho,
  };
}

const router = Router();

router.get('/health', (req, res) => {
  const echo = typeof req.query.echo === 'string' ? req.query.echo : null;
  res.json({ success: true, data: makeHealth(echo, null) });
});

router.get('/health/:pathEcho', (req, res) => {
  const echo = typeof req.query.echo === 'string' ? req.query.echo : null;
  res.json({ success: true, data: makeHealth(echo, req.params.pathEcho) });
});

export default router;
