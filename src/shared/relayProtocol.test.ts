import { describe, it, expect } from "vitest";
import { isValidRoomId, parseColorToken, relaySocketUrl } from "./relayProtocol.ts";

describe("relay protocol", () => {
  it("builds the socket URL from the server URL", () => {
    expect(relaySocketUrl("http://localhost:2308", "abc")).toBe("ws://localhost:2308/api/ws?room=abc");
    expect(relaySocketUrl("https://example.test/chess/", "abc", "B")).toBe(
      "wss://example.test/chess/api/ws?room=abc&color=b",
    );
  });

  it("validates room ids and color tokens", () => {
    expect(isValidRoomId("room_1-a")).toBe(true);
    expect(isValidRoomId("")).toBe(false);
    expect(isValidRoomId("no spaces")).toBe(false);
    expect(isValidRoomId(null)).toBe(false);
    expect(parseColorToken(" W ")).toBe("W");
    expect(parseColorToken("b")).toBe("B");
    expect(parseColorToken("s")).toBeNull();
  });
});
