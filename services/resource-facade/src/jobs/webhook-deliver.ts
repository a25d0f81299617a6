import { z } from 'zod';
import { isAxiosError, type AxiosInstance } from 'axios';
import { DeliveryRejected } from '../errors/index.js';
import type { ClientRegistry, ResourceKind } from '../registry/client-registry.js';
import type { JobDefinition } from './index.js';

export interface WebhookDeliverData {
  url: string;
  body?: unknown;
  headers?: Record<string, string>;
}

const webhookDeliverSchema: z.ZodType<WebhookDeliverData> = z.object({
  url: z.string().min(1),
  body: z.unknown(),
  headers: z.record(z.string()).optional(),
});

// 408 and 429 are worth another attempt; other 4xx answers are final
function isRejection(status: number): boolean {
  return status >= 400 && status < 500 && status !== 408 && status !== 429;
}

/**
 * POSTs a payload through the shared HTTP client.
 */
export function webhookDeliverJob(registry: ClientRegistry, http: ResourceKind<AxiosInstance>): JobDefinition<WebhookDeliverData> {
  return {
    type: 'webhook.deliver',
    schema: webhookDeliverSchema,
    async run(data, { signal, logger }) {
      try {
        const response = await registry.withResource(
          http,
          (client, combined) => client.post(data.url, data.body, { headers: data.headers, signal: combined }),
          { signal }
        );
        logger.info({ url: data.url, status: response.status }, 'Webhook delivered');
      } catch (error) {
        const status = isAxiosError(error) ? error.response?.status : undefined;
        if (status !== undefined && isRejection(status)) {
          throw new DeliveryRejected(data.url, status);
        }
        throw error;
      }
    },
  };
}
