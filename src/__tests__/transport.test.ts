import { rawDataSize, rawDataToString } from "../transport";

jest.mock("../logger", () => ({
  log: jest.fn(),
  logError: jest.fn(),
}));

describe("raw frame helpers", () => {
  it("reads single buffers, fragments and array buffers as utf8", () => {
    const text = "Kopfschmerz";
    const buffer = Buffer.from(text, "utf8");
    const fragments = [Buffer.from("Kopf", "utf8"), Buffer.from("schmerz", "utf8")];
    const arrayBuffer = new ArrayBuffer(buffer.length);
    new Uint8Array(arrayBuffer).set(buffer);

    expect(rawDataToString(buffer)).toBe(text);
    expect(rawDataToString(fragments)).toBe(text);
    expect(rawDataToString(arrayBuffer)).toBe(text);
  });

  it("measures payload size in bytes", () => {
    expect(rawDataSize(Buffer.from("ä", "utf8"))).toBe(2);
    expect(rawDataSize([Buffer.from("ab"), Buffer.from("cde")])).toBe(5);
  });
});
