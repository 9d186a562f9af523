/**
 * Scheduled Netlify Function.
 * Runs the partnership consistency check every hour and ships the log.
 */

import type { Config } from '@netlify/functions';
import { getProductionContainer } from '../../src/container.production.js';

export default async () => {
  const { consistencyService, logProvider } = getProductionContainer();

  try {
    const report = await consistencyService.check();
    return Response.json({ checked: report.checked, issues: report.issues.length });
  } finally {
    await logProvider.flush();
  }
};

export const config: Config = {
  schedule: '@hourly',
};
