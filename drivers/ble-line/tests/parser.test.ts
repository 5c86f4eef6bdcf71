import { describe, expect, it } from "vitest";
import { DECODE_ERROR_PAYLOAD, FrameParser } from "../src/parser";

const encode = (text: string): Uint8Array => new TextEncoder().encode(text);
const decode = (bytes: Uint8Array): string => new TextDecoder().decode(bytes);

describe("FrameParser", () => {
  it("splits complete lines and keeps the tail", () => {
    const parser = new FrameParser();
    parser.feed(encode("12,34\r\n56,-78\r\n9"));
    const result = parser.drain();
    expect(result.dataFrames).toEqual([
      { timestampMs: 12, millivolts: 34 },
      { timestampMs: 56, millivolts: -78 }
    ]);
    expect(result.managementFrames).toEqual([]);
    expect(result.malformed).toBe(0);
    expect(decode(parser.pending())).toBe("9");
  });

  it("replaces a line that is not valid UTF-8", () => {
    const parser = new FrameParser();
    parser.feed(new Uint8Array([0xff, 0xfe, 0x0d, 0x0a]));
    parser.feed(encode("1,2\r\n"));
    const result = parser.drain();
    expect(result.managementFrames).toEqual([{ payload: DECODE_ERROR_PAYLOAD }]);
    expect(result.dataFrames).toEqual([{ timestampMs: 1, millivolts: 2 }]);
  });

  it("leaves the buffer alone without a terminator", () => {
    const parser = new FrameParser();
    parser.feed(encode("12,3"));
    expect(parser.drain()).toEqual({ dataFrames: [], managementFrames: [], malformed: 0 });
    expect(parser.pendingBytes).toBe(4);
  });

  it("joins a line split across chunks", () => {
    const parser = new FrameParser();
    parser.feed(encode("12,3"));
    parser.drain();
    parser.feed(encode("4\r"));
    parser.feed(encode("\n7,"));
    expect(parser.drain().dataFrames).toEqual([{ timestampMs: 12, millivolts: 34 }]);
    expect(decode(parser.pending())).toBe("7,");
  });

  it("gives the same frames however the bytes are chunked", () => {
    const text = "1,10\r\nStarting DDS output\r\n2,-20\r\n3,30\r\n";
    const whole = new FrameParser();
    whole.feed(encode(text));
    const expected = whole.drain();

    const split = new FrameParser();
    const bytes = encode(text);
    for (let i = 0; i < bytes.length; i += 3) {
      split.feed(bytes.slice(i, i + 3));
    }
    expect(split.drain()).toEqual(expected);
  });

  it("routes non-data lines to management frames in order", () => {
    const parser = new FrameParser();
    parser.feed(encode("Power up complete!\r\n5,6\r\n1,2,3\r\n 7,8 \r\n"));
    const result = parser.drain();
    expect(result.managementFrames).toEqual([{ payload: "Power up complete!" }, { payload: "1,2,3" }]);
    expect(result.dataFrames).toEqual([
      { timestampMs: 5, millivolts: 6 },
      { timestampMs: 7, millivolts: 8 }
    ]);
  });

  it("counts near-numeric lines as malformed without stopping", () => {
    const parser = new FrameParser();
    parser.feed(encode("1,+-5\r\nhello\r\n2,7\r\n99999999999999999999,1\r\n3,3000000000\r\n"));
    const result = parser.drain();
    expect(result.dataFrames).toEqual([{ timestampMs: 2, millivolts: 7 }]);
    expect(result.managementFrames).toEqual([{ payload: "hello" }]);
    expect(result.malformed).toBe(3);
  });

  it("skips blank lines", () => {
    const parser = new FrameParser();
    parser.feed(encode("\r\n\r\n   \r\n"));
    expect(parser.drain()).toEqual({ dataFrames: [], managementFrames: [], malformed: 0 });
    expect(parser.pendingBytes).toBe(0);
  });

  it("replaces invalid utf-8 in management lines", () => {
    const parser = new FrameParser();
    parser.feed(new Uint8Array([0x6f, 0x6b, 0xff, 0x0d, 0x0a]));
    expect(parser.drain().managementFrames).toEqual([{ payload: "ok\uFFFD" }]);
  });

  it("accepts an explicit plus sign", () => {
    const parser = new FrameParser();
    parser.feed(encode("4,+15\r\n"));
    expect(parser.drain().dataFrames).toEqual([{ timestampMs: 4, millivolts: 15 }]);
  });

  it("discards an unterminated tail that outgrows the bound", () => {
    const parser = new FrameParser(8);
    parser.feed(encode("abcdef"));
    parser.feed(encode("ghij"));
    expect(parser.overflowCount).toBe(1);
    expect(parser.pendingBytes).toBe(0);
    parser.feed(encode("1,1\r\n"));
    expect(parser.drain().dataFrames).toEqual([{ timestampMs: 1, millivolts: 1 }]);
  });

  it("forgets everything on reset", () => {
    const parser = new FrameParser();
    parser.feed(encode("1,1\r\n2,"));
    parser.reset();
    parser.feed(encode("3,3\r\n"));
    expect(parser.drain().dataFrames).toEqual([{ timestampMs: 3, millivolts: 3 }]);
  });
});
