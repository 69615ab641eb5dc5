/**
 * QueueJob entity - one dispatched unit of background work as the job queue sees it
 */
export type QueueJobStatus = 'queued' | 'running' | 'succeeded' | 'failed';

export interface QueueJob {
  id: string;
  name: string;
  payload: unknown;
  status: QueueJobStatus;
  workerId: string | null;
  createdAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
  result: unknown;
  error: string | null;
}

export interface QueueWorker {
  id: string;
  hostname: string;
  pid: number;
  concurrency: number;
  activeJobs: number;
  startedAt: Date;
  lastSeenAt: Date;
}

export function createQueueJob(params: { id: string; name: string; payload: unknown }): QueueJob {
  return {
    id: params.id,
    name: params.name,
    payload: params.payload,
    status: 'queued',
    workerId: null,
    createdAt: new Date(),
    startedAt: null,
    completedAt: null,
    result: null,
    error: null,
  };
}

export function timeoutReason(seconds: number): string {
  return seconds === 1 ? 'Timed out after 1 second' : `Timed out after ${seconds} seconds`;
}
