import { describe, expect, it } from "vitest";
import { detectPlatform, extractUrl } from "../../src/utils/platform.js";

describe("detectPlatform", () => {
  it.each([
    ["https://www.douyin.com/video/123", "douyin"],
    ["https://v.douyin.com/abc/", "douyin"],
    ["https://www.iesdouyin.com/share/video/1", "douyin"],
    ["https://v.kuaishou.com/xyz", "kuaishou"],
    ["https://b23.tv/abc", "bilibili"],
    ["https://www.bilibili.com/video/BV1", "bilibili"],
    ["http://xhslink.com/a", "xiaohongshu"],
    ["https://haokan.baidu.com/v?vid=1", "haokan"],
    ["https://isee.weishi.qq.com/ws/app-pages/share/index.html", "weishi"],
    ["https://www.pearvideo.com/video_1", "pearvideo"],
    ["https://h5.pipigx.com/pp/post/1", "pipigaoxiao"],
  ])("classifies %s as %s", (url, platform) => {
    expect(detectPlatform(url)).toBe(platform);
  });

  it("returns null for unsupported hosts and garbage", () => {
    expect(detectPlatform("https://example.com/video/1")).toBeNull();
    expect(detectPlatform("not a url")).toBeNull();
  });
});

describe("extractUrl", () => {
  it("pulls the link out of share text and trims trailing punctuation", () => {
    const text = "7.43 复制打开抖音，看看 https://v.douyin.com/iRNBho6u/, 太好看了";
    expect(extractUrl(text)).toBe("https://v.douyin.com/iRNBho6u/");
  });

  it("strips closing quotes and brackets", () => {
    expect(extractUrl('see "https://b23.tv/abc")')).toBe("https://b23.tv/abc");
  });

  it("returns null when there is no http link", () => {
    expect(extractUrl("ftp://example.com/file")).toBeNull();
    expect(extractUrl("   ")).toBeNull();
  });
});
