import type { FastifyInstance } from 'fastify';

export async function healthRoutes(app: FastifyInstance): Promise<void> {
  app.get('/', async () => ({ message: 'AI Gateway is running' }));

  app.get('/health', async () => ({ status: 'healthy', service: 'ai-gateway' }));
}
