/**
 * OscParser - Static utility class for decoding OSC 1.0 datagrams
 *
 * WIRE FORMAT (big-endian throughout):
 * - Message: address string, type tag string (",fff..."), arguments
 * - Bundle:  "#bundle" string, 8-byte timetag, then elements of
 *            [int32 size][message or bundle bytes]
 * - Strings are null-terminated and padded to a multiple of 4 bytes
 *
 * Supported type tags:
 * - i int32, f float32, d float64, h int64, c char (int32)
 * - s / S string, b blob (int32 size + bytes, padded)
 * - t timetag (seconds since 1900), T true, F false, N nil, I impulse
 */

export type OscArgument = number | string | boolean | null | Uint8Array;

export interface OscMessage {
  address: string;
  typeTags: string;
  args: OscArgument[];
}

export interface OscBundle {
  timetag: number;
  elements: OscPacket[];
}

export type OscPacket =
  | { kind: "message"; message: OscMessage }
  | { kind: "bundle"; bundle: OscBundle };

export class OscParseError extends Error {
  constructor(
    message: string,
    public readonly offset: number,
  ) {
    super(`${message} (at byte ${offset})`);
    this.name = "OscParseError";
  }
}

const BUNDLE_TAG = "#bundle";
const MAX_BUNDLE_DEPTH = 8;
const NTP_FRACTION = 2 ** 32;

function padded(length: number): number {
  return (length + 3) & ~3;
}

class Reader {
  offset = 0;
  private view: DataView;

  constructor(private bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get remaining(): number {
    return this.bytes.byteLength - this.offset;
  }

  private require(n: number, what: string): void {
    if (this.remaining < n) {
      throw new OscParseError(`Truncated ${what}`, this.offset);
    }
  }

  string(): string {
    const start = this.offset;
    const end = this.bytes.indexOf(0, start);
    if (end < 0) {
      throw new OscParseError("Unterminated string", start);
    }
    const text = new TextDecoder().decode(this.bytes.subarray(start, end));
    const next = start + padded(end - start + 1);
    if (next > this.bytes.byteLength) {
      throw new OscParseError("String padding past end of packet", start);
    }
    this.offset = next;
    return text;
  }

  int32(): number {
    this.require(4, "int32");
    const v = this.view.getInt32(this.offset, false);
    this.offset += 4;
    return v;
  }

  float32(): number {
    this.require(4, "float32");
    const v = this.view.getFloat32(this.offset, false);
    this.offset += 4;
    return v;
  }

  float64(): number {
    this.require(8, "float64");
    const v = this.view.getFloat64(this.offset, false);
    this.offset += 8;
    return v;
  }

  int64(): number {
    this.require(8, "int64");
    const v = this.view.getBigInt64(this.offset, false);
    this.offset += 8;
    return Number(v);
  }

  timetag(): number {
    this.require(8, "timetag");
    const seconds = this.view.getUint32(this.offset, false);
    const fraction = this.view.getUint32(this.offset + 4, false);
    this.offset += 8;
    return seconds + fraction / NTP_FRACTION;
  }

  blob(): Uint8Array {
    const size = this.int32();
    if (size < 0) {
      throw new OscParseError("Negative blob size", this.offset - 4);
    }
    this.require(padded(size), "blob");
    const data = this.bytes.slice(this.offset, this.offset + size);
    this.offset += padded(size);
    return data;
  }

  sub(size: number): Uint8Array {
    this.require(size, "bundle element");
    const data = this.bytes.subarray(this.offset, this.offset + size);
    this.offset += size;
    return data;
  }
}

export class OscParser {
  /**
   * Decode one datagram into a message or bundle.
   * @throws OscParseError on any framing problem
   */
  static parse(data: Uint8Array): OscPacket {
    return OscParser.parsePacket(data, 0);
  }

  /**
   * Flatten a packet into its messages, bundle order preserved.
   */
  static messages(packet: OscPacket): OscMessage[] {
    if (packet.kind === "message") return [packet.message];
    return packet.bundle.elements.flatMap((el) => OscParser.messages(el));
  }

  private static parsePacket(data: Uint8Array, depth: number): OscPacket {
    if (data.byteLength === 0) {
      throw new OscParseError("Empty packet", 0);
    }
    if (data.byteLength % 4 !== 0) {
      throw new OscParseError(
        `Packet size ${data.byteLength} is not a multiple of 4`,
        0,
      );
    }

    const first = data[0];
    if (first === 0x23 /* '#' */) {
      return { kind: "bundle", bundle: OscParser.parseBundle(data, depth) };
    }
    if (first === 0x2f /* '/' */) {
      return { kind: "message", message: OscParser.parseMessage(data) };
    }
    throw new OscParseError(
      `Unexpected leading byte 0x${first.toString(16)}`,
      0,
    );
  }

  private static parseBundle(data: Uint8Array, depth: number): OscBundle {
    if (depth >= MAX_BUNDLE_DEPTH) {
      throw new OscParseError("Bundles nested too deeply", 0);
    }
    const reader = new Reader(data);
    const tag = reader.string();
    if (tag !== BUNDLE_TAG) {
      throw new OscParseError(`Expected "${BUNDLE_TAG}", got "${tag}"`, 0);
    }
    const timetag = reader.timetag();

    const elements: OscPacket[] = [];
    while (reader.remaining > 0) {
      const size = reader.int32();
      if (size <= 0 || size % 4 !== 0) {
        throw new OscParseError(`Invalid bundle element size ${size}`, reader.offset - 4);
      }
      elements.push(OscParser.parsePacket(reader.sub(size), depth + 1));
    }
    return { timetag, elements };
  }

  private static parseMessage(data: Uint8Array): OscMessage {
    const reader = new Reader(data);
    const address = reader.string();

    if (reader.remaining === 0) {
      // Type tag string omitted by very old senders: no arguments
      return { address, typeTags: "", args: [] };
    }

    const tagOffset = reader.offset;
    const typeTagString = reader.string();
    if (!typeTagString.startsWith(",")) {
      throw new OscParseError("Type tag string must start with ','", tagOffset);
    }
    const typeTags = typeTagString.slice(1);

    const args: OscArgument[] = [];
    for (const tag of typeTags) {
      switch (tag) {
        case "i":
        case "c":
          args.push(reader.int32());
          break;
        case "f":
          args.push(reader.float32());
          break;
        case "d":
          args.push(reader.float64());
          break;
        case "h":
          args.push(reader.int64());
          break;
        case "t":
          args.push(reader.timetag());
          break;
        case "s":
        case "S":
          args.push(reader.string());
          break;
        case "b":
          args.push(reader.blob());
          break;
        case "T":
          args.push(true);
          break;
        case "F":
          args.push(false);
          break;
        case "N":
        case "I":
          args.push(null);
          break;
        default:
          throw new OscParseError(`Unsupported type tag '${tag}'`, tagOffset);
      }
    }

    if (reader.remaining !== 0) {
      throw new OscParseError(
        `${reader.remaining} trailing bytes after arguments`,
        reader.offset,
      );
    }

    return { address, typeTags, args };
  }
}
