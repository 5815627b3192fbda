/**
 * Audit trail entries written to the tenant's activity log
 */

import { randomUUID } from 'node:crypto';
import { ACTIVITY_LOG_LABEL } from '@mdm-mcp/core';
import type { ReltioClient } from './client.js';

export interface ActivityRequestBody {
  label: string;
  description: string;
}

/** `xxxx-xxxx-xxxxxxxx` from random hex */
export function generateActivityId(): string {
  const hex = randomUUID().replace(/-/g, '');
  return `${hex.slice(0, 4)}-${hex.slice(4, 8)}-${hex.slice(8, 16)}`;
}

export function createActivityBody(description: string, label: string = ACTIVITY_LOG_LABEL): ActivityRequestBody {
  return { label, description };
}

export class ActivityLogger {
  private readonly client: ReltioClient;
  private readonly label: string;

  constructor(client: ReltioClient, label: string = ACTIVITY_LOG_LABEL) {
    this.client = client;
    this.label = label;
  }

  /**
   * POST one activity. Errors propagate; callers decide whether an audit
   * failure matters.
   */
  async record(tenant: string, description: string): Promise<void> {
    const url = this.client.apiUrl('activities', tenant);
    await this.client.request(
      url,
      { method: 'POST', body: createActivityBody(description, this.label) },
      { ActivityID: generateActivityId() }
    );
  }
}
