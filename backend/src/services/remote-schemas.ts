import { z } from 'zod';

export const remoteUserSchema = z.object({
  id: z.number().int(),
  firstName: z.string(),
  lastName: z.string(),
  email: z.string(),
  phone: z.string(),
  age: z.number().int(),
});

export const remoteProductSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  price: z.number(),
  quantity: z.number().int(),
  total: z.number(),
  discountPercentage: z.number(),
});

export const remoteCartSchema = z.object({
  id: z.number().int(),
  userId: z.number().int(),
  total: z.number(),
  discountedTotal: z.number(),
  totalProducts: z.number().int(),
  totalQuantity: z.number().int(),
  products: z.array(remoteProductSchema).default([]),
});

export type RemoteUser = z.infer<typeof remoteUserSchema>;
export type RemoteProduct = z.infer<typeof remoteProductSchema>;
export type RemoteCart = z.infer<typeof remoteCartSchema>;

/** List resources answer with an object whose `<resource>` field holds the page. */
export const pageEnvelopeSchema = z.record(z.string(), z.unknown());
