import type { CredentialPool } from "./credential-pool";
import { GithubApiError, type Credential, type GithubGateway, type RateLimitPayload } from "./types";

export interface ProbedCredential {
  credential: Credential;
  /** Null when the probe failed for a transport reason and the token was kept optimistically. */
  limits: RateLimitPayload | null;
}

export interface ProbeResult {
  usable: ProbedCredential[];
  rejected: Array<{ credential: Credential; reason: string }>;
}

function rejectionReason(error: GithubApiError): string | null {
  if (error.status === 401) {
    return "Unauthorized - invalid token";
  }
  if (error.status === 403 && !error.rateLimited) {
    return "Forbidden - token may be expired or revoked";
  }
  return null;
}

/** Checks every token against the rate-limit endpoint, which costs no quota. */
export async function probeCredentials(gateway: GithubGateway, credentials: readonly Credential[]): Promise<ProbeResult> {
  const result: ProbeResult = { usable: [], rejected: [] };

  console.log(`🔑 Validating ${credentials.length} GitHub token(s)…`);
  const outcomes = await Promise.all(
    credentials.map(async (credential) => {
      try {
        const response = await gateway.getRateLimit(credential);
        return { credential, limits: response.data, error: null };
      } catch (error) {
        return { credential, limits: null, error };
      }
    })
  );

  for (const { credential, limits, error } of outcomes) {
    if (limits) {
      console.log(
        `  ✅ ${credential.id}: core ${limits.core.remaining}/${limits.core.limit}, search ${limits.search.remaining}/${limits.search.limit}`
      );
      result.usable.push({ credential, limits });
      continue;
    }
    const reason = error instanceof GithubApiError ? rejectionReason(error) : null;
    if (reason) {
      console.warn(`  ❌ ${credential.id}: ${reason}`);
      result.rejected.push({ credential, reason });
      continue;
    }
    console.warn(
      `  ⚠️  ${credential.id}: probe failed (${error instanceof Error ? error.message : String(error)}); keeping token`
    );
    result.usable.push({ credential, limits: null });
  }

  const hourlyCapacity = result.usable.reduce((sum, probed) => sum + (probed.limits?.core.limit ?? 5000), 0);
  console.log(
    `ℹ️  ${result.usable.length} usable token(s), ${result.rejected.length} rejected; ~${hourlyCapacity.toLocaleString(
      "en-US"
    )} core requests/hour`
  );
  return result;
}

/** Copies probed quota into the pools. Tokens probed without a response keep the optimistic default. */
export function seedPools(result: ProbeResult, searchPool: CredentialPool, corePool: CredentialPool) {
  for (const { credential, limits } of result.usable) {
    if (!limits) {
      continue;
    }
    searchPool.recordResponse(credential, limits.search.remaining, new Date(limits.search.reset * 1000));
    corePool.recordResponse(credential, limits.core.remaining, new Date(limits.core.reset * 1000));
  }
}
