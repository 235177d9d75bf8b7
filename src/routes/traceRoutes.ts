import type { FastifyInstance } from 'fastify';
import type { TraceSearchFilter } from '../services/traceStore.js';
import { isDeliveryStatus, isTraceDirection } from '../services/traceStore.js';
import { TraceSyncError } from '../services/errors.js';
import { parseOptionalDate, parseLimitOffset, optionalText, type QueryString } from './helpers.js';
import type { AdminServices } from './services.js';

export const parseTraceSearch = (query: QueryString): TraceSearchFilter => {
  const status = optionalText(query.status);
  if (status !== undefined && !isDeliveryStatus(status)) {
    throw new TraceSyncError('InvalidRequest', `unknown delivery status ${status}`);
  }
  const direction = optionalText(query.direction);
  if (direction !== undefined && !isTraceDirection(direction)) {
    throw new TraceSyncError('InvalidRequest', `unknown direction ${direction}`);
  }
  const order = optionalText(query.order);
  if (order !== undefined && order !== 'asc' && order !== 'desc') {
    throw new TraceSyncError('InvalidRequest', 'order must be asc or desc');
  }
  const tenantIds = optionalText(query.tenantId)?.split(',').map((value) => value.trim()).filter(Boolean);

  return {
    tenantIds,
    receivedFrom: parseOptionalDate(query.from, 'from'),
    receivedTo: parseOptionalDate(query.to, 'to'),
    sender: optionalText(query.sender),
    senderContains: optionalText(query.senderContains),
    recipient: optionalText(query.recipient),
    recipientContains: optionalText(query.recipientContains),
    senderDomain: optionalText(query.senderDomain),
    recipientDomain: optionalText(query.recipientDomain),
    subjectContains: optionalText(query.subject),
    status,
    direction,
    q: optionalText(query.q),
    order,
    ...parseLimitOffset(query),
  };
};

export const registerTraceRoutes = async (app: FastifyInstance, services: AdminServices) => {
  app.get<{ Querystring: QueryString }>('/api/traces', async (req) => services.traces.search(parseTraceSearch(req.query)));

  app.get<{ Params: { traceId: string } }>('/api/traces/:traceId', async (req) => {
    const trace = await services.traces.get(req.params.traceId);
    if (!trace) {
      throw new TraceSyncError('NotFound', 'trace not found');
    }
    return { trace };
  });

  app.get<{ Querystring: QueryString }>('/api/dashboard', async (req) =>
    services.dashboard({ tenantId: optionalText(req.query.tenantId) }));
};
