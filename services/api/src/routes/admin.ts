import type { FastifyInstance } from 'fastify';
import { registerAdminEntryRoutes } from './admin/entries.js';
import { registerAdminReportRoutes } from './admin/reports.js';

/**
 * Admin-only routes: the review queue, decisions and reports.
 */
export async function adminRoutes(fastify: FastifyInstance): Promise<void> {
  registerAdminEntryRoutes(fastify);
  registerAdminReportRoutes(fastify);
}
