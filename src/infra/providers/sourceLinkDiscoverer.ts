import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type {
  Candidate,
  SourceDescriptor,
  SourceKind,
} from "../../core/entities/source";
import type { LinkDiscoveryPort } from "../../core/ports/inboundPorts";

/**
 * Routes each source to the discoverer registered for its kind.
 */
export class SourceLinkDiscoverer implements LinkDiscoveryPort {
  constructor(
    private readonly discoverers: Record<SourceKind, LinkDiscoveryPort>,
  ) {}

  discover(
    source: SourceDescriptor,
    limit: number,
  ): Promise<Result<Candidate[], AppBoundaryError>> {
    return this.discoverers[source.kind].discover(source, limit);
  }
}
