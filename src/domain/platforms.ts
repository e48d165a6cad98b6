export type PlatformId = "baidu" | "toutiao";

export interface PlatformDefinition {
  id: PlatformId;
  title: string;
  type: string;
  description: string;
  link: string;
}

export const PLATFORM_DEFINITIONS: readonly PlatformDefinition[] = [
  {
    id: "baidu",
    title: "百度",
    type: "热搜榜",
    description: "百度实时热搜",
    link: "https://top.baidu.com/board?tab=realtime",
  },
  {
    id: "toutiao",
    title: "今日头条",
    type: "热榜",
    description: "头条热门榜",
    link: "https://www.toutiao.com/hot-event/hot-board/?origin=toutiao_pc",
  },
];

export const PLATFORM_MAP = new Map<PlatformId, PlatformDefinition>(
  PLATFORM_DEFINITIONS.map((platform) => [platform.id, platform]),
);

export function isSupportedPlatform(platform: string): platform is PlatformId {
  return PLATFORM_DEFINITIONS.some((definition) => definition.id === platform);
}

export function listPlatformIds(): PlatformId[] {
  return PLATFORM_DEFINITIONS.map((platform) => platform.id);
}
