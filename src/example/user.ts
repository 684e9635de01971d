import { z } from "zod";

export const userSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  username: z.string(),
  email: z.string(),
  phone: z.string().optional(),
  website: z.string().optional(),
});

export type User = z.infer<typeof userSchema>;
