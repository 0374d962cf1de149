/**
 * Renders channel groups as an archive engine configuration:
 *
 *   <?xml version="1.0" encoding="UTF-8"?>
 *   <engineconfig>
 *     <group>
 *       <name>Default_Group</name>
 *       <channel>
 *         <name>BL7:Mot:Parker:HROT.RBV</name>
 *         <period>00:00:10</period>
 *         <monitor/>
 *       </channel>
 *     </group>
 *   </engineconfig>
 */

import { XMLBuilder } from 'fast-xml-parser';
import type { ChannelDescriptor, ChannelGroup } from '@archconf/types';

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

interface ChannelNode {
  name: string;
  period: string;
  monitor?: string;
  scan?: string;
}

interface GroupNode {
  name: string;
  channel?: ChannelNode[];
}

const builder = new XMLBuilder({
  format: true,
  indentBy: '  ',
  suppressEmptyNode: true,
});

function toChannelNode(channel: ChannelDescriptor): ChannelNode {
  const node: ChannelNode = { name: channel.name, period: channel.period };
  if (channel.mode === 'scan') {
    node.scan = '';
  } else {
    node.monitor = channel.threshold === undefined ? '' : String(channel.threshold);
  }
  return node;
}

function toGroupNode(group: ChannelGroup): GroupNode {
  // An empty channel array would still emit a stray element
  if (group.channels.length === 0) {
    return { name: group.name };
  }
  return { name: group.name, channel: group.channels.map(toChannelNode) };
}

/**
 * Serialize groups to the XML document text (UTF-8, two-space indent,
 * trailing newline). The same groups always produce the same bytes.
 */
export function renderEngineConfig(groups: readonly ChannelGroup[]): string {
  const xml: string = builder.build({
    engineconfig: { group: groups.map(toGroupNode) },
  });
  return `${XML_DECLARATION}\n${xml.trim()}\n`;
}
