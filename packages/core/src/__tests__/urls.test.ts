import { describe, it, expect } from "vitest";
import { createStaticUrlResolver, isRemoteUrl, joinUrlPath } from "../urls.js";

describe("joinUrlPath", () => {
  it("returns the path unchanged without a base", () => {
    expect(joinUrlPath("", "assets/main.js")).toBe("assets/main.js");
  });

  it("adds the missing slash between base and path", () => {
    expect(joinUrlPath("bundler", "assets/main.js")).toBe("bundler/assets/main.js");
    expect(joinUrlPath("/static/", "assets/main.js")).toBe("/static/assets/main.js");
  });

  it("keeps absolute paths and URLs", () => {
    expect(joinUrlPath("bundler", "/assets/main.js")).toBe("/assets/main.js");
    expect(joinUrlPath("bundler", "https://cdn.test/main.js")).toBe("https://cdn.test/main.js");
  });

  it("resolves against an absolute base URL", () => {
    expect(joinUrlPath("https://cdn.test/app", "assets/main.js")).toBe(
      "https://cdn.test/app/assets/main.js",
    );
  });
});

describe("isRemoteUrl", () => {
  it("matches http and https only", () => {
    expect(isRemoteUrl("https://cdn.test/manifest.json")).toBe(true);
    expect(isRemoteUrl("HTTP://cdn.test/manifest.json")).toBe(true);
    expect(isRemoteUrl("/srv/http/manifest.json")).toBe(false);
    expect(isRemoteUrl("file:///srv/manifest.json")).toBe(false);
  });
});

describe("createStaticUrlResolver", () => {
  it("serves assets below the static URL", () => {
    expect(createStaticUrlResolver("/static/")("bundler/main.js")).toBe("/static/bundler/main.js");
  });
});
