import { Resolver } from 'dns/promises';
import type { SoaRecord } from 'dns';
import { describeError } from '../errors/index.js';

export const MAX_PROBE_TIMEOUT_MS = 10_000;

export interface DnsLookup {
  resolve4(hostname: string): Promise<string[]>;
  /** Ask one specific server, by address, for the SOA of `domainName` */
  resolveSoa(domainName: string, serverAddress: string): Promise<SoaRecord>;
  /** Abandon every query still outstanding */
  cancel(): void;
}

/** Builds the lookup for a single probe, bounded by `timeoutMs` per query */
export type DnsLookupFactory = (timeoutMs: number) => DnsLookup;

export interface ProbeResult {
  propagated: boolean;
  nameServer: string;
  detail: string;
}

export const createNodeDnsLookup: DnsLookupFactory = timeoutMs => {
  const resolver = new Resolver({ timeout: timeoutMs, tries: 1 });
  return {
    resolve4: hostname => resolver.resolve4(hostname),
    resolveSoa: (domainName, serverAddress) => {
      resolver.setServers([serverAddress]);
      return resolver.resolveSoa(domainName);
    },
    cancel: () => resolver.cancel()
  };
};

/**
 * One-shot check that a delegated nameserver answers for the domain.
 * Advisory only: every failure, including the deadline, comes back as
 * `propagated: false`.
 */
export class DnsPropagationProbe {
  constructor(private readonly createLookup: DnsLookupFactory = createNodeDnsLookup) {}

  async probe(domainName: string, nameServer: string, timeoutMs: number = MAX_PROBE_TIMEOUT_MS): Promise<ProbeResult> {
    const budget = Math.min(timeoutMs, MAX_PROBE_TIMEOUT_MS);
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new Error(`no answer within ${budget} ms`)), budget);
    });

    const dns = this.createLookup(budget);

    try {
      return await Promise.race([this.query(dns, domainName, nameServer), deadline]);
    } catch (error) {
      return { propagated: false, nameServer, detail: describeError(error) };
    } finally {
      clearTimeout(timer);
      dns.cancel();
    }
  }

  private async query(dns: DnsLookup, domainName: string, nameServer: string): Promise<ProbeResult> {
    const [address] = await dns.resolve4(nameServer);
    if (!address) {
      throw new Error(`${nameServer} has no IPv4 address`);
    }

    const soa = await dns.resolveSoa(domainName, address);
    return {
      propagated: true,
      nameServer,
      detail: `SOA ${soa.nsname} serial ${soa.serial}`
    };
  }
}
