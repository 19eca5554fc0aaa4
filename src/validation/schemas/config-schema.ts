import { z } from 'zod';
import { DEFAULT_MAX_CONTENT_SIZE } from '../common';

export const MAX_FILE_SIZE_LIMIT = 10 * 1024 * 1024; // 10MB hard limit

const FileSize = z
  .number({
    invalid_type_error: 'maxFileSize must be a number',
  })
  .int('maxFileSize must be an integer')
  .min(1)
  .max(MAX_FILE_SIZE_LIMIT);

export const TimetableConfigSchema = z
  .object({
    dataDir: z.string().min(1, 'dataDir cannot be empty').default('data'),
    checkReferences: z.boolean().default(true),
    checkTimeFormat: z.boolean().default(false),
    maxFileSize: FileSize.default(DEFAULT_MAX_CONTENT_SIZE),
    includeYaml: z.boolean().default(false),
  })
  .strict();

export type TimetableConfigInput = z.input<typeof TimetableConfigSchema>;
export type TimetableConfig = z.infer<typeof TimetableConfigSchema>;
