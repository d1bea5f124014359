/** Blog index with `count` repeated post blocks under navigation chrome. */
export function listingPage(count: number): string {
  const posts = Array.from({ length: count }, (_, i) => {
    const n = i + 1;
    const day = String(n).padStart(2, "0");
    return `
      <div class="post">
        <h2><a href="/posts/${n}">Post number ${n} headline</a></h2>
        <p>Teaser for post ${n}</p>
        <time datetime="2024-03-${day}T00:00:00Z">${n} March</time>
      </div>`;
  }).join("");

  return `<!doctype html>
<html>
  <head><title>Example Blog</title></head>
  <body>
    <nav>
      <a href="/about">About this website</a>
      <a href="/contact">Contact the team</a>
    </nav>
    <main>${posts}
    </main>
    <footer><a href="/privacy">Privacy policy page</a></footer>
  </body>
</html>`;
}

/** Single article page with a navigation bar and a footer. */
export function articlePage(): string {
  return `<!doctype html>
<html>
  <head>
    <title>Deep dive into caching</title>
    <meta property="article:published_time" content="2024-02-10T08:00:00Z">
  </head>
  <body>
    <nav><a href="/">Home</a> <a href="/archive">Archive</a> Browse every section of this site from here</nav>
    <div id="content">
      <p>First paragraph of the article body with plenty of text.</p>
      <p>Second paragraph continues the discussion.</p>
    </div>
    <footer>Copyright footer text that is fairly long but never the article</footer>
  </body>
</html>`;
}

export function rssDocument(
  entries: ReadonlyArray<{ readonly title: string; readonly link: string; readonly pubDate: string }>,
): string {
  const items = entries
    .map(
      (e) =>
        `<item><title>${e.title}</title><link>${e.link}</link><pubDate>${e.pubDate}</pubDate><description>About ${e.title}</description></item>`,
    )
    .join("");
  return `<?xml version="1.0" encoding="UTF-8"?><rss version="2.0"><channel><title>Feed</title><link>https://example.com/</link><description>d</description>${items}</channel></rss>`;
}
