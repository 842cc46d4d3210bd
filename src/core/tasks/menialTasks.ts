import { AppError } from '../../shared/errors/app-error';
import type { CompletionGateway } from '../llm/completion-gateway';

export type TaskType = 'format' | 'extract' | 'transform' | 'validate' | 'generate';
export type OutputFormat = 'text' | 'json' | 'markdown' | 'code';

const TASK_PROMPTS: Record<TaskType, (format: string) => string> = {
  format: (format) => `You are a formatting assistant. Format the following data as clean ${format}. Be precise and consistent.`,
  extract: (format) => `You are a data extraction assistant. Extract relevant information and present it as ${format}.`,
  transform: (format) =>
    `You are a data transformation assistant. Transform the input according to common patterns and output as ${format}.`,
  validate: () => 'You are a validation assistant. Check the data for errors, inconsistencies, or issues. Report findings clearly.',
  generate: (format) =>
    `You are a content generation assistant. Generate appropriate content based on the input, formatted as ${format}.`,
};

const FORMAT_HINTS: Record<OutputFormat, string> = {
  json: '\n\nOutput valid JSON only.',
  markdown: '\n\nUse proper Markdown formatting.',
  code: '\n\nOutput clean, properly formatted code.',
  text: '\n\nOutput plain text.',
};

export const TASK_TYPES: readonly TaskType[] = ['format', 'extract', 'transform', 'validate', 'generate'];
export const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'json', 'markdown', 'code'];

const TASK_TEMPERATURE = 0.3;
const TASK_MAX_TOKENS = 2048;

function isTaskType(value: string): value is TaskType {
  return TASK_TYPES.some((type) => type === value);
}

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * System prompt for a task type. The output format is interpolated into the
 * prompt; a format without a known hint gets no hint suffix.
 */
export function buildTaskSystemPrompt(taskType: string, outputFormat: string): string {
  if (!isTaskType(taskType)) {
    throw new AppError(
      'UNKNOWN_TASK_TYPE',
      `Unknown task type: ${taskType}. Available types: ${TASK_TYPES.join(', ')}`,
      undefined,
      { taskType },
    );
  }
  const hint = isOutputFormat(outputFormat) ? FORMAT_HINTS[outputFormat] : '';
  return TASK_PROMPTS[taskType](outputFormat) + hint;
}

export interface MenialTaskRequest {
  taskType: string;
  taskData: string;
  outputFormat: string;
  clientId?: string;
}

export async function runMenialTask(gateway: CompletionGateway, request: MenialTaskRequest): Promise<string> {
  const systemPrompt = buildTaskSystemPrompt(request.taskType, request.outputFormat);
  return gateway.complete({
    prompt: `Task: ${request.taskType}\n\nData:\n${request.taskData}`,
    systemPrompt,
    temperature: TASK_TEMPERATURE,
    maxTokens: TASK_MAX_TOKENS,
    clientId: request.clientId,
  });
}
