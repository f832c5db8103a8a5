import { describe, it, expect } from "vitest";
import { OscParseError, OscParser } from "./OscParser";
import {
  encodeBundle,
  encodeMessage,
  floats,
} from "../../tests/helpers/oscEncoder";

/** Raw ASCII bytes, NULs included as written. */
function ascii(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

function concat(...parts: Uint8Array[]): Uint8Array {
  const out = new Uint8Array(parts.reduce((n, p) => n + p.length, 0));
  let offset = 0;
  for (const p of parts) {
    out.set(p, offset);
    offset += p.length;
  }
  return out;
}

describe("OscParser", () => {
  describe("messages", () => {
    it("should decode address, type tags and float arguments", () => {
      const packet = OscParser.parse(
        encodeMessage("/left/joint/3", floats([1, 2, 3, 1, 0, 0, 0])),
      );

      expect(packet.kind).toBe("message");
      const [message] = OscParser.messages(packet);
      expect(message.address).toBe("/left/joint/3");
      expect(message.typeTags).toBe("fffffff");
      expect(message.args).toEqual([1, 2, 3, 1, 0, 0, 0]);
    });

    it("should honour 4-byte string padding", () => {
      const [message] = OscParser.messages(
        OscParser.parse(
          encodeMessage("/abc", [
            { type: "s", value: "hello" },
            { type: "i", value: -5 },
          ]),
        ),
      );

      expect(message.address).toBe("/abc");
      expect(message.args).toEqual(["hello", -5]);
    });

    it("should decode doubles and argument-less tags", () => {
      const [message] = OscParser.messages(
        OscParser.parse(
          encodeMessage("/x", [
            { type: "i", value: 7 },
            { type: "d", value: 0.1 },
            { type: "T" },
            { type: "N" },
          ]),
        ),
      );

      expect(message.typeTags).toBe("idTN");
      expect(message.args).toEqual([7, 0.1, true, null]);
    });

    it("should treat a message without a type tag string as having no arguments", () => {
      const [message] = OscParser.messages(OscParser.parse(ascii("/ping\0\0\0")));

      expect(message).toEqual({ address: "/ping", typeTags: "", args: [] });
    });
  });

  describe("bundles", () => {
    it("should flatten bundle elements in order", () => {
      const packet = OscParser.parse(
        encodeBundle([
          encodeMessage("/a", floats([1])),
          encodeMessage("/b", floats([2])),
        ]),
      );

      expect(packet.kind).toBe("bundle");
      if (packet.kind === "bundle") {
        expect(packet.bundle.timetag).toBe(1);
      }
      expect(OscParser.messages(packet).map((m) => m.address)).toEqual([
        "/a",
        "/b",
      ]);
    });

    it("should flatten nested bundles", () => {
      const inner = encodeBundle([encodeMessage("/inner", floats([3]))]);
      const packet = OscParser.parse(
        encodeBundle([encodeMessage("/outer", floats([4])), inner]),
      );

      expect(OscParser.messages(packet).map((m) => m.address)).toEqual([
        "/outer",
        "/inner",
      ]);
    });
  });

  describe("framing errors", () => {
    it("should reject an empty packet", () => {
      expect(() => OscParser.parse(new Uint8Array(0))).toThrow(OscParseError);
    });

    it("should reject a size that is not a multiple of 4", () => {
      expect(() => OscParser.parse(ascii("/a\0"))).toThrow(/not a multiple of 4/);
    });

    it("should reject an unexpected leading byte", () => {
      expect(() => OscParser.parse(ascii("abc\0"))).toThrow(
        /Unexpected leading byte 0x61/,
      );
    });

    it("should reject a type tag string without a comma", () => {
      expect(() => OscParser.parse(ascii("/a\0\0fff\0"))).toThrow(
        /must start with ','/,
      );
    });

    it("should reject unsupported type tags", () => {
      expect(() => OscParser.parse(ascii("/a\0\0,x\0\0"))).toThrow(
        /Unsupported type tag 'x'/,
      );
    });

    it("should reject truncated arguments", () => {
      expect(() => OscParser.parse(ascii("/a\0\0,f\0\0"))).toThrow(
        /Truncated float32/,
      );
    });

    it("should reject trailing bytes after the arguments", () => {
      const data = concat(encodeMessage("/a", floats([1])), new Uint8Array(4));

      expect(() => OscParser.parse(data)).toThrow(/4 trailing bytes/);
    });

    it("should reject a bundle element with an invalid size", () => {
      const data = concat(ascii("#bundle\0"), new Uint8Array(8), new Uint8Array([0, 0, 0, 3]));

      expect(() => OscParser.parse(data)).toThrow(/Invalid bundle element size 3/);
    });
  });
});
