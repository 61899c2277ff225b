import type { FastifyInstance } from 'fastify';

interface HealthResponse {
  status: 'ok';
  store: 'postgres' | 'memory';
  timestamp: string;
  uptime: number;
}

export async function healthRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get<{ Reply: HealthResponse }>('/health', async () => {
    return {
      status: 'ok',
      store: fastify.timecards.config.storeDriver,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    };
  });
}
