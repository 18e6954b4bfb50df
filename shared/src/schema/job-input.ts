import { z } from 'zod';

// Step names are validated separately so unknown names can be reported together
export const CreateJobInputSchema = z.object({
  key: z.string().trim().min(1, 'key is required'),
  pipeline: z.array(z.string()).optional(),
});

export const PresignUploadInputSchema = z.object({
  filename: z.string().trim().min(1, 'filename is required'),
  content_type: z.string().optional(),
});

export type CreateJobInput = z.infer<typeof CreateJobInputSchema>;
export type PresignUploadInput = z.infer<typeof PresignUploadInputSchema>;
