/**
 * Platform detection for submitted links.
 * Pure classifier: host substring → platform tag.
 */

export type Platform =
  | "douyin"
  | "kuaishou"
  | "bilibili"
  | "xiaohongshu"
  | "haokan"
  | "weishi"
  | "pearvideo"
  | "pipigaoxiao";

const HOST_MARKERS: ReadonlyArray<[Platform, readonly string[]]> = [
  ["douyin", ["douyin", "iesdouyin"]],
  ["kuaishou", ["kuaishou", "kwai"]],
  ["bilibili", ["bilibili", "b23.tv"]],
  ["xiaohongshu", ["xiaohongshu", "xhslink"]],
  ["haokan", ["haokan.baidu.com", "haokan.hao123.com"]],
  ["weishi", ["weishi.qq.com", "isee.weishi"]],
  ["pearvideo", ["pearvideo"]],
  ["pipigaoxiao", ["pipigx"]],
];

const URL_PATTERN = /https?:\/\/\S+/;
const TRAILING_PUNCTUATION = /[.,;:!?)"']+$/;

/**
 * Returns the platform tag for a URL, or null when unsupported or unparseable.
 */
export function detectPlatform(raw: string): Platform | null {
  let host: string;
  try {
    host = new URL(raw).host.toLowerCase();
  } catch {
    return null;
  }

  for (const [platform, markers] of HOST_MARKERS) {
    if (markers.some((marker) => host.includes(marker))) {
      return platform;
    }
  }
  return null;
}

/**
 * Pulls the first http(s) link out of free text such as an app "share" blurb.
 */
export function extractUrl(input: string): string | null {
  const match = URL_PATTERN.exec(input.trim());
  if (!match) {
    return null;
  }
  const url = match[0].replace(TRAILING_PUNCTUATION, "");
  return url || null;
}
