/**
 * TXT lookup against the zone's authoritative nameservers.
 *
 * Asking the authoritative servers directly keeps recursive-resolver caches
 * out of the picture: the anchor we read is the one the publisher wrote.
 * Falling back to the system resolver is opt-in
 * (`POA_DNS_ALLOW_SYSTEM_RESOLVER=1`).
 */
import { Resolver } from "node:dns/promises";
import { isIP } from "node:net";
import { DnsResolutionError, formatError } from "../poa/errors.js";
import type { PoaConfig } from "../config.js";

export const SYSTEM_RESOLVER = "SYSTEM_RESOLVER";

export interface TxtAnswer {
  /** One entry per TXT record, each split into its character-strings */
  records: string[][];
  /** Nameserver that answered */
  nameserver: string;
}

export interface TxtLookup {
  lookupTxt(name: string): Promise<TxtAnswer>;
}

export interface AuthoritativeLookupOptions {
  /** Zone whose NS set is queried when no override is given */
  zone: string;
  /** Nameserver host names or addresses that replace the NS lookup */
  nameservers?: string[];
  allowSystemResolver?: boolean;
  /** Per-query timeout */
  timeoutMs: number;
}

export function normalizeNameserver(host: string): string {
  return host.trim().replace(/\.$/, "");
}

/** `"ns1.example.net., 192.0.2.53"` → `["ns1.example.net", "192.0.2.53"]` */
export function parseNameserverList(value: string): string[] {
  return value
    .split(",")
    .map(normalizeNameserver)
    .filter((host) => host.length > 0);
}

function hasContent(records: string[][]): boolean {
  return records.some((chunks) => chunks.join("").trim().length > 0);
}

export function createAuthoritativeTxtLookup(options: AuthoritativeLookupOptions): TxtLookup {
  const resolverOptions = { timeout: options.timeoutMs, tries: 1 };
  const system = new Resolver(resolverOptions);

  async function addressesOf(host: string): Promise<string[]> {
    if (isIP(host)) return [host];
    const [v4, v6] = await Promise.allSettled([system.resolve4(host), system.resolve6(host)]);
    const addresses = [
      ...(v4.status === "fulfilled" ? v4.value : []),
      ...(v6.status === "fulfilled" ? v6.value : []),
    ];
    if (addresses.length === 0) {
      throw new DnsResolutionError(`cannot resolve nameserver ${host}`);
    }
    return addresses;
  }

  async function authoritativeNameservers(): Promise<string[]> {
    if (options.nameservers && options.nameservers.length > 0) {
      return options.nameservers.map(normalizeNameserver);
    }
    const ns = await system.resolveNs(options.zone);
    return ns.map(normalizeNameserver).filter((host) => host.length > 0);
  }

  return {
    async lookupTxt(name: string): Promise<TxtAnswer> {
      let lastError: unknown = null;

      let nameservers: string[] = [];
      try {
        nameservers = await authoritativeNameservers();
      } catch (error) {
        lastError = error;
      }

      for (const nameserver of nameservers) {
        try {
          const resolver = new Resolver(resolverOptions);
          resolver.setServers(await addressesOf(nameserver));
          const records = await resolver.resolveTxt(name);
          if (hasContent(records)) {
            return { records, nameserver };
          }
        } catch (error) {
          lastError = error;
        }
      }

      if (options.allowSystemResolver) {
        try {
          const records = await system.resolveTxt(name);
          if (hasContent(records)) {
            return { records, nameserver: SYSTEM_RESOLVER };
          }
        } catch (error) {
          lastError = error;
        }
      }

      throw new DnsResolutionError(
        `no TXT returned for ${name} via authoritative NS (zone=${options.zone})` +
          (lastError === null ? "" : `: ${formatError(lastError)}`),
        { cause: lastError }
      );
    },
  };
}

export function txtLookupFromConfig(
  config: Pick<PoaConfig, "dnsZone" | "nameserverOverride" | "allowSystemResolver" | "dnsTimeoutMs">
): TxtLookup {
  return createAuthoritativeTxtLookup({
    zone: config.dnsZone,
    nameservers: config.nameserverOverride,
    allowSystemResolver: config.allowSystemResolver,
    timeoutMs: config.dnsTimeoutMs,
  });
}
