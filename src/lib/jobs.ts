import { type Job, Queue, Worker } from "bullmq";
import type { DispatchRequest, SendTicket, TicketDispatcher } from "@/modules/registry/registry.types";
import { jobLogger } from "./logger";
import type { ValkeyConnection } from "./valkey";

// ─────────────────────────────────────────────────────────────
// Queue Names
// ─────────────────────────────────────────────────────────────

export const QueueNames = {
  TICKET_DISPATCH: "ticket-dispatch",
} as const;

export const TICKET_JOB = "send-ticket";

// ─────────────────────────────────────────────────────────────
// Ticket dispatch queue
// ─────────────────────────────────────────────────────────────

/**
 * Create the ticket dispatch queue. Each request gets exactly one attempt;
 * failures are logged by the worker and dropped.
 */
export function createTicketQueue(connection: ValkeyConnection) {
  const workerConnection = {
    ...connection,
    maxRetriesPerRequest: null, // Required for BullMQ workers
  };

  const queue = new Queue<DispatchRequest>(QueueNames.TICKET_DISPATCH, {
    // Fail the handoff fast instead of buffering while Valkey is down
    connection: { ...connection, enableOfflineQueue: false },
    defaultJobOptions: {
      attempts: 1,
      removeOnComplete: { count: 100 },
      removeOnFail: { count: 500 },
    },
  });

  let worker: Worker<DispatchRequest> | null = null;

  const dispatcher: TicketDispatcher = {
    async enqueue(request) {
      const job = await queue.add(TICKET_JOB, request);
      jobLogger.debug({ jobId: job.id, indexKey: request.indexKey }, "Ticket dispatch queued");
    },
  };

  return {
    dispatcher,

    /**
     * Start consuming dispatch requests with the given sender
     */
    startWorker(sendTicket: SendTicket, concurrency = 5): void {
      if (worker) return;

      worker = new Worker<DispatchRequest>(
        QueueNames.TICKET_DISPATCH,
        (job: Job<DispatchRequest>) => processTicketJob(job, sendTicket),
        {
          connection: workerConnection,
          concurrency,
        },
      );

      worker.on("failed", (job, err) => {
        jobLogger.error({ err, jobId: job?.id }, "Ticket dispatch job failed");
      });

      jobLogger.info("Ticket dispatch worker started");
    },

    /**
     * Stop the worker and close the queue
     */
    async close(): Promise<void> {
      const closing: Promise<void>[] = [];
      if (worker) closing.push(worker.close());
      closing.push(queue.close());
      await Promise.all(closing);

      jobLogger.info("Ticket dispatch queue stopped");
    },
  };
}

/**
 * Send one ticket. A false result is logged, not thrown, so BullMQ records
 * the job as completed and never retries it.
 */
export async function processTicketJob(
  job: Pick<Job<DispatchRequest>, "id" | "data">,
  sendTicket: SendTicket,
): Promise<boolean> {
  const { contactAddress, displayName, indexKey } = job.data;
  jobLogger.info({ jobId: job.id, indexKey }, "Processing ticket dispatch");

  const sent = await sendTicket(contactAddress, displayName, indexKey);

  if (sent) {
    jobLogger.info({ jobId: job.id, indexKey }, "Ticket sent");
  } else {
    jobLogger.warn({ jobId: job.id, indexKey }, "Ticket could not be sent");
  }

  return sent;
}
