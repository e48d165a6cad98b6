export function escapeXml(value: string): string {
  return value
    .replaceAll("&", "&amp;")
    .replaceAll("<", "&lt;")
    .replaceAll(">", "&gt;")
    .replaceAll("\"", "&quot;")
    .replaceAll("'", "&apos;");
}

export interface RssItemInput {
  title: string;
  link: string;
  description?: string;
  category?: string;
  pubDate?: string;
}

export interface RssFeedInput {
  title: string;
  link: string;
  description?: string;
  lastBuildDate?: string;
  items: RssItemInput[];
}

function element(name: string, value: string | undefined): string {
  return value === undefined ? "" : `<${name}>${escapeXml(value)}</${name}>`;
}

export function buildRssXml(feed: RssFeedInput): string {
  const itemsXml = feed.items
    .map((item) =>
      [
        "<item>",
        element("title", item.title),
        element("link", item.link),
        element("guid", item.link),
        element("description", item.description ?? ""),
        element("category", item.category),
        element("pubDate", item.pubDate),
        "</item>",
      ].join(""),
    )
    .join("");

  return `<?xml version="1.0" encoding="UTF-8"?>` +
    `<rss version="2.0"><channel>` +
    element("title", feed.title) +
    element("link", feed.link) +
    element("description", feed.description ?? "") +
    element("lastBuildDate", feed.lastBuildDate) +
    itemsXml +
    `</channel></rss>`;
}
