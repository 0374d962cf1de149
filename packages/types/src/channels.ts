import type { SampleMode } from './records.js';

/**
 * One archived channel, derived from an archive policy.
 *
 * `name` is the record name, or `<record>.<property>` when the policy lists
 * properties.
 */
export interface ChannelDescriptor {
  readonly name: string;
  readonly period: string;
  readonly mode: SampleMode;
  /** Monitor deadband, rendered as the text of the <monitor> element */
  readonly threshold?: number;
}

/**
 * A named set of channels in the output document.
 */
export interface ChannelGroup {
  readonly name: string;
  readonly channels: readonly ChannelDescriptor[];
}
