import { hintFromDiscordError, parseUserIds } from "../bot";

describe("parseUserIds", () => {
  test("accepts mentions, nickname mentions and raw ids in order", () => {
    expect(parseUserIds(" <@111> <@!222>   333 someone <#444> ")).toEqual(["111", "222", "333"]);
  });

  test("returns nothing for text without ids", () => {
    expect(parseUserIds("@everyone hello")).toEqual([]);
  });
});

describe("hintFromDiscordError", () => {
  test("explains missing access and missing permissions", () => {
    expect(hintFromDiscordError({ code: 50001 })).toMatch(/^Missing Access \(50001\)\./);
    expect(hintFromDiscordError({ rawError: { code: 50013 } })).toMatch(
      /^Missing Permissions \(50013\)\./
    );
  });

  test("returns null for anything else", () => {
    expect(hintFromDiscordError(new Error("boom"))).toBeNull();
    expect(hintFromDiscordError({ code: 10062 })).toBeNull();
    expect(hintFromDiscordError("boom")).toBeNull();
  });
});
