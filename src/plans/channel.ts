/**
 * Acquisition channel
 */

export interface ChannelOptions {
  config: string;
  group?: string;
  /** Exposure time in milliseconds */
  exposure?: number;
  /** false: acquire only the central plane of the z stack */
  doStack?: boolean;
  /** Added to the z of every event in this channel */
  zOffset?: number;
  /** Acquire only on time points divisible by this stride */
  acquireEvery?: number;
  /** Carried through to serialization; expansion does not read it */
  camera?: string;
}

/**
 * The part of a channel carried by each event
 */
export interface ChannelRef {
  config: string;
  group: string;
}

export class Channel {
  readonly config: string;
  readonly group: string;
  readonly exposure?: number;
  readonly doStack: boolean;
  readonly zOffset?: number;
  readonly acquireEvery: number;
  readonly camera?: string;

  constructor(options: ChannelOptions) {
    this.config = options.config;
    this.group = options.group ?? 'Channel';
    this.exposure = options.exposure;
    this.doStack = options.doStack ?? true;
    this.zOffset = options.zOffset;
    this.acquireEvery = options.acquireEvery ?? 1;
    this.camera = options.camera;
    Object.freeze(this);
  }

  toRef(): ChannelRef {
    return { config: this.config, group: this.group };
  }

  toJSON(): Record<string, unknown> {
    return {
      config: this.config,
      group: this.group,
      exposure: this.exposure,
      doStack: this.doStack,
      zOffset: this.zOffset,
      acquireEvery: this.acquireEvery,
      camera: this.camera,
    };
  }
}
