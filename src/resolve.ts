import { listNetworks, listOrganizations, type Network, type Organization } from "./api.js";
import { NotFoundError } from "./errors.js";
import type { ReportContext } from "./reports/context.js";

/** First item whose name matches exactly */
export function findByName<T extends { name: string }>(items: readonly T[], name: string): T | undefined {
  return items.find((item) => item.name === name);
}

export async function resolveOrganization(ctx: ReportContext, name: string): Promise<Organization> {
  ctx.logger.info(`Getting organization ID for: ${name}`);
  const org = findByName(await listOrganizations(ctx.client), name);
  if (!org) throw new NotFoundError(`Organization '${name}' not found`);
  ctx.logger.info(`Organization ID found: ${org.id}`);
  return org;
}

export async function resolveNetwork(ctx: ReportContext, org: Organization, name: string): Promise<Network> {
  ctx.logger.info(`Getting network ID for: ${name}`);
  const network = findByName(await listNetworks(ctx.client, org.id), name);
  if (!network) throw new NotFoundError(`Network '${name}' not found in organization '${org.name}'`);
  ctx.logger.info(`Network ID found: ${network.id}`);
  return network;
}

export interface Target {
  organization: Organization;
  network: Network;
}

export async function resolveTarget(ctx: ReportContext, orgName: string, networkName: string): Promise<Target> {
  const organization = await resolveOrganization(ctx, orgName);
  const network = await resolveNetwork(ctx, organization, networkName);
  return { organization, network };
}
