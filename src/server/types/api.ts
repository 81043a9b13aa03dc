import { z } from 'zod';

/**
 * Start spider request body
 */
export const runSpiderBodySchema = z.object({
  spider_name: z.string().trim().min(1, 'spider_name must not be empty'),
  spider_kwargs: z.record(z.unknown()).default({}),
  priority: z.number().int().min(1).max(10).default(1),
  timeout: z.number().int().min(60).default(3600),
});

export type RunSpiderBody = z.infer<typeof runSpiderBodySchema>;

/**
 * Task ID parameter
 */
export const taskIdParamsSchema = z.object({
  taskId: z.string().min(1),
});

export type TaskIdParams = z.infer<typeof taskIdParamsSchema>;

/**
 * Result pagination query parameters
 */
export const resultsQuerySchema = z.object({
  start: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

export type ResultsQuery = z.infer<typeof resultsQuerySchema>;

export type TaskStatusView = 'pending' | 'running' | 'stopping' | 'completed' | 'failed' | 'stopped';

export interface JobSummaryView {
  items_scraped: number;
  items_dropped: number;
  close_reason: string;
  duration_ms: number;
}

/**
 * Task as returned by the API
 */
export interface TaskView {
  task_id: string;
  spider_name: string;
  kwargs: Record<string, unknown>;
  priority: number;
  timeout: number;
  status: TaskStatusView;
  start_time: string;
  end_time: string | null;
  items_count: number;
  failure_reason: string | null;
  /** Seconds between start and end, once the task ended */
  execution_time: number | null;
  result: JobSummaryView | null;
}

export interface StartedTaskResponse {
  task_id: string;
  status: 'started' | 'failed';
  message: string;
  spider_name: string;
  created_at: string;
}

export interface ResultsResponse {
  task_id: string;
  items: Record<string, unknown>[];
  pagination: {
    start: number;
    limit: number;
    total: number;
    has_more: boolean;
  };
}

export interface StopTaskResponse {
  message: string;
  task_id: string;
  status: TaskStatusView;
}

export interface SpiderView {
  name: string;
  description: string | null;
  allowed_domains: string[];
  start_urls: string[];
}
