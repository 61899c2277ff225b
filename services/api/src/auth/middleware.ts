import type { FastifyReply, FastifyRequest } from 'fastify';
import { EmployeeRole, type Employee } from '@timecard/shared';

declare module 'fastify' {
  interface FastifyRequest {
    employee?: Employee;
  }
}

/**
 * preHandler: resolve `Authorization: Bearer <token>` to an active employee.
 */
export async function requireAuth(
  request: FastifyRequest,
  reply: FastifyReply
): Promise<FastifyReply | void> {
  const authHeader = request.headers.authorization;

  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    return reply.status(401).send({
      error: 'Unauthorized',
      message: 'Missing or invalid authorization header',
    });
  }

  const token = authHeader.substring('Bearer '.length).trim();
  const employee = await request.server.timecards.employees.findBySessionToken(token, new Date());

  if (!employee) {
    return reply.status(401).send({
      error: 'Unauthorized',
      message: 'Invalid or expired session token',
    });
  }

  request.employee = employee;
}

/**
 * preHandler: must run after `requireAuth`.
 */
export async function requireAdmin(
  request: FastifyRequest,
  reply: FastifyReply
): Promise<FastifyReply | void> {
  if (!request.employee) {
    return reply.status(401).send({
      error: 'Unauthorized',
      message: 'Authentication required',
    });
  }

  if (request.employee.role !== EmployeeRole.ADMIN) {
    return reply.status(403).send({
      error: 'Forbidden',
      message: 'Admin role required',
    });
  }
}

/**
 * The authenticated employee. Only valid in handlers behind `requireAuth`.
 */
export function currentEmployee(request: FastifyRequest): Employee {
  if (!request.employee) {
    throw new Error('currentEmployee() called on a route without requireAuth');
  }
  return request.employee;
}
