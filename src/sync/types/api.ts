import { z } from "zod";

export const oauthCredentialsSchema = z.object({
  consumerKey: z.string().min(1, "Discogs consumer key is required"),
  consumerSecret: z.string().min(1, "Discogs consumer secret is required"),
  token: z.string().min(1, "OAuth access token is required"),
  tokenSecret: z.string().min(1, "OAuth access token secret is required"),
});

/** Exactly one of a personal access token or an OAuth key pair. */
export const discogsCredentialsSchema = z
  .object({
    personalToken: z.string().min(1).optional(),
    oauth: oauthCredentialsSchema.optional(),
  })
  .refine((c) => (c.personalToken === undefined) !== (c.oauth === undefined), {
    message: "Provide exactly one of a personal access token or OAuth credentials",
  });

export const syncRequestSchema = z.object({
  userId: z.number().int().positive(),
  username: z.string().min(1, "Discogs username is required"),
  kind: z.enum(["collection", "inventory"]),
  resume: z.boolean().default(false),
});

export type OAuthCredentials = z.infer<typeof oauthCredentialsSchema>;
export type DiscogsCredentials = z.infer<typeof discogsCredentialsSchema>;
export type SyncRequest = z.infer<typeof syncRequestSchema>;
