import { logger } from '../../lib/logger.js';
import type { QueueProcessor } from '../queue/index.js';
import type { PayloadStore } from '../storage/payload-store.js';

/** One spreadsheet attachment handed over by the mail-fetching collaborator. */
export interface AttachmentDelivery {
  rawBytes: Buffer;
  /** Message id, mailbox and the like; opaque to the pipeline. */
  sourceRef: string;
  receivedAt: Date;
  filename: string;
}

export class Intake {
  constructor(
    private readonly payloads: PayloadStore,
    private readonly queue: Pick<QueueProcessor, 'enqueue'>,
  ) {}

  /** Persists the attachment to pending/ and enqueues it. Returns the job id. */
  async admit(delivery: AttachmentDelivery): Promise<string> {
    const payloadPath = await this.payloads.writePending(delivery.filename, delivery.rawBytes);
    const jobId = await this.queue.enqueue(delivery.sourceRef, payloadPath);
    logger.info(
      {
        jobId,
        sourceRef: delivery.sourceRef,
        filename: delivery.filename,
        bytes: delivery.rawBytes.length,
        receivedAt: delivery.receivedAt.toISOString(),
      },
      'Attachment admitted',
    );
    return jobId;
  }
}
