// src/connectors/reddit/schemas.ts

import { z } from 'zod';

/**
 * Generic Reddit listing envelope. Children are validated per endpoint.
 */
export const ListingSchema = z.object({
  kind: z.literal('Listing'),
  data: z.object({
    after: z.string().nullable(),
    children: z.array(
      z.object({
        kind: z.string(),
        data: z.record(z.unknown()),
      })
    ),
  }),
});

export const SubredditSchema = z.object({
  display_name: z.string().min(1),
});

export const SavedThingSchema = z.object({
  id: z.string().min(1),
});

/** GET /api/v1/me/friends */
export const FriendListSchema = z.object({
  kind: z.literal('UserList'),
  data: z.object({
    children: z.array(
      z.object({
        name: z.string().min(1),
        id: z.string().optional(),
        date: z.number().optional(),
      })
    ),
  }),
});

export const PreferencesSchema = z.record(z.unknown());

/** Body Reddit sends with a 400 on friend endpoints */
export const ApiReasonSchema = z.object({
  reason: z.string(),
  explanation: z.string().optional(),
});

export type Listing = z.infer<typeof ListingSchema>;
export type ListingChild = Listing['data']['children'][number];
