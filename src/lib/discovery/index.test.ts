import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

vi.mock("node:fs/promises", () => ({
  access: vi.fn(),
  mkdir: vi.fn(),
  readFile: vi.fn(),
  writeFile: vi.fn(),
}));

import { access, mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { SurveyConfig } from "../config.js";
import { DownloadError } from "../errors.js";
import { Output } from "../output.js";
import { downloadFile, fetchBuildFiles } from "./index.js";

const README_URL = "https://example.test/README.md";

const README = [
  "## Contents",
  "- [Apps](#apps)",
  "## Apps",
  "- [One](https://github.com/a/one)",
  "- [Mono](https://github.com/x/mono)",
  "- [Elsewhere](https://gitlab.com/b/two)",
  "- [None](https://github.com/c/none)",
  "- [Flaky](https://github.com/d/flaky)",
].join("\n");

const config: SurveyConfig = {
  sourceUrl: README_URL,
  cacheDir: "cache",
  branches: ["main", "master"],
  profile: "build-gradle",
  monorepos: { "x/mono": "app" },
};

const fetchMock = vi.fn<(url: string) => Promise<Response>>();

function respond(url: string): Promise<Response> {
  const ok = [
    README_URL,
    "https://raw.githubusercontent.com/a/one/main/android/app/build.gradle",
    "https://raw.githubusercontent.com/x/mono/master/app/android/app/build.gradle",
  ];
  if (url.includes("/d/flaky/")) {
    return Promise.reject(new TypeError("fetch failed"));
  }
  return Promise.resolve(ok.includes(url) ? new Response("content", { status: 200 }) : new Response("", { status: 404 }));
}

describe("fetchBuildFiles", () => {
  let out: Output;

  beforeEach(() => {
    vi.resetAllMocks();
    vi.stubGlobal("fetch", fetchMock);
    vi.spyOn(console, "log").mockImplementation(() => {});
    out = new Output({ verbose: false });
    vi.mocked(readFile).mockResolvedValue(README as never);
    vi.mocked(mkdir).mockResolvedValue(undefined);
    vi.mocked(writeFile).mockResolvedValue(undefined);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it("downloads the first available build file of each repository", async () => {
    vi.mocked(access).mockRejectedValue(new Error("ENOENT"));
    fetchMock.mockImplementation(respond);

    const summary = await fetchBuildFiles(config, out);

    expect(summary).toEqual({
      downloaded: [join("cache", "a_one.build.gradle"), join("cache", "x_mono.build.gradle")],
      missing: ["https://github.com/c/none"],
      skipped: ["https://gitlab.com/b/two"],
      failed: [{ link: "https://github.com/d/flaky", reason: "fetch failed" }],
    });
    expect(readFile).toHaveBeenCalledWith(join("cache", "source_readme.md"), "utf-8");
    expect(fetchMock).toHaveBeenCalledWith(
      "https://raw.githubusercontent.com/x/mono/main/app/android/app/build.gradle"
    );
    expect(writeFile).toHaveBeenCalledTimes(3);
  });

  it("reuses cached files unless forced", async () => {
    vi.mocked(access).mockResolvedValue(undefined);

    const summary = await fetchBuildFiles(config, out);

    expect(fetchMock).not.toHaveBeenCalled();
    expect(summary.downloaded).toEqual([
      join("cache", "a_one.build.gradle"),
      join("cache", "x_mono.build.gradle"),
      join("cache", "c_none.build.gradle"),
      join("cache", "d_flaky.build.gradle"),
    ]);
  });

  it("fails when the README cannot be downloaded", async () => {
    vi.mocked(access).mockRejectedValue(new Error("ENOENT"));
    fetchMock.mockResolvedValue(new Response("", { status: 500 }));

    await expect(fetchBuildFiles(config, out)).rejects.toBeInstanceOf(DownloadError);
    await expect(fetchBuildFiles(config, out)).rejects.toThrow(`Download failed: ${README_URL}`);
    expect(readFile).not.toHaveBeenCalled();
  });
});

describe("downloadFile", () => {
  beforeEach(() => {
    vi.resetAllMocks();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("writes the body after creating the parent directory", async () => {
    vi.mocked(access).mockRejectedValue(new Error("ENOENT"));
    fetchMock.mockResolvedValue(new Response("plugins {}", { status: 200 }));

    await expect(downloadFile("https://example.test/f", "cache/sub/f.gradle")).resolves.toBe(true);

    expect(mkdir).toHaveBeenCalledWith("cache/sub", { recursive: true });
    expect(vi.mocked(writeFile).mock.calls[0][0]).toBe("cache/sub/f.gradle");
    expect(String(vi.mocked(writeFile).mock.calls[0][1])).toBe("plugins {}");
  });

  it("returns false on a non-OK response without writing", async () => {
    vi.mocked(access).mockRejectedValue(new Error("ENOENT"));
    fetchMock.mockResolvedValue(new Response("", { status: 404 }));

    await expect(downloadFile("https://example.test/f", "f.gradle")).resolves.toBe(false);
    expect(writeFile).not.toHaveBeenCalled();
  });

  it("downloads again when forced", async () => {
    vi.mocked(access).mockResolvedValue(undefined);
    fetchMock.mockResolvedValue(new Response("new", { status: 200 }));

    await expect(downloadFile("https://example.test/f", "f.gradle", { force: true })).resolves.toBe(true);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(access).not.toHaveBeenCalled();
  });
});
