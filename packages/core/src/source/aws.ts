/**
 * PrefixListSource backed by the EC2 managed prefix list API.
 *
 * Both EC2 calls follow the NextToken the service returns; the caller's
 * account is resolved through STS GetCallerIdentity.
 */

import {
  DescribeManagedPrefixListsCommand,
  EC2Client,
  GetManagedPrefixListEntriesCommand,
  type ManagedPrefixList,
  type PrefixListEntry,
} from "@aws-sdk/client-ec2";
import { GetCallerIdentityCommand, STSClient } from "@aws-sdk/client-sts";
import { fromIni } from "@aws-sdk/credential-providers";
import type { Logger } from "pino";
import type { Entry, PrefixList } from "../schemas/prefix-list.js";
import type { PrefixListSource } from "./interface.js";

export interface AwsSourceOptions {
  /** Named profile from the shared config files; default chain otherwise. */
  profile?: string;
  region?: string;
  logger?: Logger;
}

export function toPrefixList(raw: ManagedPrefixList): PrefixList | null {
  if (!raw.PrefixListId) {
    return null;
  }
  return {
    id: raw.PrefixListId,
    ...(raw.PrefixListName !== undefined && { name: raw.PrefixListName }),
    ...(raw.OwnerId !== undefined && { owner: raw.OwnerId }),
  };
}

export function toEntry(raw: PrefixListEntry): Entry {
  return {
    ...(raw.Cidr !== undefined && { block: raw.Cidr }),
    ...(raw.Description !== undefined && { description: raw.Description }),
  };
}

export function createAwsPrefixListSource(
  options: AwsSourceOptions = {},
): PrefixListSource {
  const clientConfig = {
    ...(options.region ? { region: options.region } : {}),
    ...(options.profile
      ? { credentials: fromIni({ profile: options.profile }) }
      : {}),
  };
  const ec2 = new EC2Client(clientConfig);
  const sts = new STSClient(clientConfig);
  const logger = options.logger;

  return {
    async listPrefixLists(): Promise<PrefixList[]> {
      logger?.info("Retrieving all managed prefix lists...");
      const lists: PrefixList[] = [];
      let nextToken: string | undefined;

      do {
        const response = await ec2.send(
          new DescribeManagedPrefixListsCommand({ NextToken: nextToken }),
        );
        for (const raw of response.PrefixLists ?? []) {
          const list = toPrefixList(raw);
          if (list) {
            lists.push(list);
          } else {
            logger?.debug({ raw }, "Skipping prefix list without an id");
          }
        }
        nextToken = response.NextToken;
      } while (nextToken);

      logger?.debug({ count: lists.length }, "Retrieved managed prefix lists");
      return lists;
    },

    async getPrefixListEntries(listId: string): Promise<Entry[]> {
      const entries: Entry[] = [];
      let nextToken: string | undefined;

      do {
        const response = await ec2.send(
          new GetManagedPrefixListEntriesCommand({
            PrefixListId: listId,
            NextToken: nextToken,
          }),
        );
        entries.push(...(response.Entries ?? []).map(toEntry));
        nextToken = response.NextToken;
      } while (nextToken);

      return entries;
    },

    async getCallerAccountId(): Promise<string> {
      const identity = await sts.send(new GetCallerIdentityCommand({}));
      if (!identity.Account) {
        throw new Error("GetCallerIdentity returned no account id");
      }
      return identity.Account;
    },
  };
}
