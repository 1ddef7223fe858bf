import type { VercelRequest, VercelResponse } from '@vercel/node';
import { loadConfig } from '../src/config';
import { getPool } from '../src/db/client';
import { JobsRepository } from '../src/db/jobs';
import { CaptureValidationError } from '../src/errors';
import { createIngestionServices } from '../src/services';
import { isAuthorized } from '../src/utils/auth';
import { logger } from '../src/utils/logger';

/**
 * Capture endpoint for the browser extension
 * Stores the posting currently open in the browser
 */
export default async function handler(
  req: VercelRequest,
  res: VercelResponse
): Promise<void> {
  // The extension posts cross-origin
  res.setHeader('Access-Control-Allow-Origin', '*');
  res.setHeader('Access-Control-Allow-Methods', 'POST, OPTIONS');
  res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization');

  if (req.method === 'OPTIONS') {
    res.status(204).end();
    return;
  }

  if (req.method !== 'POST') {
    res.status(405).json({ error: 'Method not allowed' });
    return;
  }

  try {
    const config = loadConfig(process.env, { requireDatabase: true });

    if (!isAuthorized(req.headers.authorization, config.captureSecret)) {
      logger.warn('Unauthorized capture request', {
        authHeader: req.headers.authorization ? 'present' : 'missing',
      });
      res.status(401).json({ error: 'Unauthorized' });
      return;
    }

    const { capture } = createIngestionServices(config, new JobsRepository(getPool()));
    const result = await capture.capture(req.body);

    res.status(result.status === 'created' ? 201 : 200).json({
      success: true,
      status: result.status,
      id: result.id,
    });
  } catch (error) {
    if (error instanceof CaptureValidationError) {
      res.status(400).json({ success: false, error: error.message, issues: error.issues });
      return;
    }

    logger.error('Capture failed', error);
    res.status(500).json({
      success: false,
      error: error instanceof Error ? error.message : 'Unknown error',
    });
  }
}
