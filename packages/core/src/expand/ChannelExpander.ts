import type { ArchivePolicy, ChannelDescriptor, ChannelGroup, DbRecord } from '@archconf/types';
import { isArchiveAttribute } from '@archconf/types';

/**
 * Channels for one archive policy of a record.
 *
 * No property list: the record itself. Otherwise `<record>.<property>` per
 * listed property, which is nothing for an empty list.
 */
export function expandPolicy(recordName: string, policy: ArchivePolicy): ChannelDescriptor[] {
  if (policy.properties === null) {
    return [{ name: recordName, period: policy.period, mode: policy.mode }];
  }
  return policy.properties.map((property) => ({
    name: `${recordName}.${property}`,
    period: policy.period,
    mode: policy.mode,
  }));
}

/**
 * Flatten every archive attribute of every record into channels, in
 * record, attribute, property order. Field attributes contribute nothing.
 */
export function expandChannels(records: readonly DbRecord[]): ChannelDescriptor[] {
  const channels: ChannelDescriptor[] = [];
  for (const record of records) {
    for (const attribute of record.attributes) {
      if (isArchiveAttribute(attribute)) {
        channels.push(...expandPolicy(record.name, attribute.policy));
      }
    }
  }
  return channels;
}

/**
 * Number of channels a policy expands to.
 */
export function countChannels(policy: ArchivePolicy): number {
  return policy.properties === null ? 1 : policy.properties.length;
}

export const DEFAULT_GROUP_NAME = 'Default_Group';

/**
 * Wrap channels in the single group of the output document.
 */
export function groupChannels(
  channels: readonly ChannelDescriptor[],
  name: string = DEFAULT_GROUP_NAME
): ChannelGroup {
  return { name, channels };
}
