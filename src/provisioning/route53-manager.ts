import {
  Route53Client,
  ListHostedZonesByNameCommand,
  ListHostedZonesByNameCommandOutput,
  ListResourceRecordSetsCommand,
  ListResourceRecordSetsCommandOutput,
  ChangeResourceRecordSetsCommand,
  Change,
  ResourceRecordSet,
  RRType
} from '@aws-sdk/client-route-53';
import { ProvisioningError, describeError } from '../errors/index.js';
import { ExecutionContext, clientOptions } from '../config/credentials.js';
import { Logger } from '../utils/logger.js';
import { HostedZoneDirectory } from './types.js';

const PROTECTED_APEX_TYPES = new Set(['NS', 'SOA']);

function fullyQualified(domainName: string): string {
  return domainName.endsWith('.') ? domainName : `${domainName}.`;
}

export class Route53Manager implements HostedZoneDirectory {
  private client: Route53Client;

  constructor(context: ExecutionContext, private readonly logger?: Logger) {
    this.client = new Route53Client(clientOptions(context));
  }

  async findHostedZoneIds(domainName: string): Promise<string[]> {
    const zoneName = fullyQualified(domainName);
    const ids: string[] = [];
    let dnsName: string | undefined = zoneName;
    let hostedZoneId: string | undefined;

    try {
      // Zones come back sorted by name, starting at `dnsName`
      while (dnsName !== undefined) {
        const page: ListHostedZonesByNameCommandOutput = await this.client.send(
          new ListHostedZonesByNameCommand({ DNSName: dnsName, HostedZoneId: hostedZoneId })
        );
        const zones = page.HostedZones ?? [];

        for (const zone of zones) {
          if (zone.Name === zoneName && zone.Id) {
            ids.push(zone.Id.replace(/^\/hostedzone\//, ''));
          }
        }

        const passedZone = zones.some(zone => zone.Name !== zoneName);
        if (!page.IsTruncated || passedZone) {
          break;
        }
        dnsName = page.NextDNSName;
        hostedZoneId = page.NextHostedZoneId;
      }
    } catch (error) {
      throw new ProvisioningError(`Failed to look up hosted zones for ${domainName}: ${describeError(error)}`, {
        cause: error
      });
    }

    return ids;
  }

  async purgeExtraneousRecords(hostedZoneId: string, domainName: string): Promise<string[]> {
    const apex = fullyQualified(domainName);
    const records = await this.listRecords(hostedZoneId);
    const doomed = records.filter(
      record => !(record.Name === apex && record.Type !== undefined && PROTECTED_APEX_TYPES.has(record.Type))
    );

    if (doomed.length === 0) {
      return [];
    }

    try {
      await this.client.send(
        new ChangeResourceRecordSetsCommand({
          HostedZoneId: hostedZoneId,
          ChangeBatch: {
            Comment: `Remove records for ${domainName} before deleting the hosted zone`,
            Changes: doomed.map((record): Change => ({ Action: 'DELETE', ResourceRecordSet: record }))
          }
        })
      );
    } catch (error) {
      throw new ProvisioningError(`Failed to delete DNS records in ${hostedZoneId}: ${describeError(error)}`, {
        cause: error
      });
    }

    const removed = doomed.map(record => `${record.Name} ${record.Type}`);
    this.logger?.debug(`Deleted ${removed.length} DNS records from ${hostedZoneId}`);
    return removed;
  }

  private async listRecords(hostedZoneId: string): Promise<ResourceRecordSet[]> {
    const records: ResourceRecordSet[] = [];
    let startName: string | undefined;
    let startType: RRType | undefined;
    let startIdentifier: string | undefined;

    try {
      for (;;) {
        const page: ListResourceRecordSetsCommandOutput = await this.client.send(
          new ListResourceRecordSetsCommand({
            HostedZoneId: hostedZoneId,
            StartRecordName: startName,
            StartRecordType: startType,
            StartRecordIdentifier: startIdentifier
          })
        );
        records.push(...(page.ResourceRecordSets ?? []));

        if (!page.IsTruncated) {
          break;
        }
        startName = page.NextRecordName;
        startType = page.NextRecordType;
        startIdentifier = page.NextRecordIdentifier;
      }
    } catch (error) {
      throw new ProvisioningError(`Failed to list DNS records in ${hostedZoneId}: ${describeError(error)}`, {
        cause: error
      });
    }

    return records;
  }
}
