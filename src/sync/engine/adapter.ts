import type { NormalizedEntity, ResourceKind } from "@/sync/types";
import type { DiscogsClient } from "@/sync/discogs/client";
import type { RemoteResource } from "@/sync/discogs/types";

/**
 * Remote side of a sync: where a resource kind's pages live and how one raw
 * record becomes a typed entity. Remote schema drift stays behind this seam.
 */
export interface ResourceAdapter<TEntity extends NormalizedEntity> {
  kind: ResourceKind;
  /** Singular noun for messages ("release", "listing"). */
  noun: string;
  resource: RemoteResource;
  /** Remote id of a raw record, or null when it has none. */
  remoteIdOf(raw: unknown): string | null;
  /** Parse and enrich; may issue one detail request through the client. */
  normalize(raw: unknown, client: DiscogsClient): Promise<TEntity>;
}
