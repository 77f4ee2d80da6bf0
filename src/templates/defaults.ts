/**
 * Built-in templates, used when no override is found
 */

export function getDefaultPageTemplate(): string {
  return `<!DOCTYPE html>
<html lang="{{site.language}}">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>{{title}}{{#if site.title}} · {{site.title}}{{/if}}</title>
{{#if description}}
  <meta name="description" content="{{description}}">
{{/if}}
{{#if feed}}
  <link rel="alternate" type="application/rss+xml" title="{{site.title}}" href="{{feed}}">
{{/if}}
</head>
<body>
  <nav><a href="{{index}}">{{site.title}}</a></nav>
  <article>
{{{content}}}
  </article>
{{#if date}}
  <footer><time datetime="{{date}}">{{date}}</time></footer>
{{/if}}
</body>
</html>
`;
}

export function getDefaultEmbedTemplate(): string {
  return `<!DOCTYPE html>
<html lang="{{site.language}}">
<head>
  <meta charset="utf-8">
  <title>{{title}}</title>
  <style>
    body { font-family: system-ui, sans-serif; line-height: 1.55; margin: 0 auto; max-width: 42rem; padding: 1rem; }
    img { max-width: 100%; }
    pre { overflow: auto; }
  </style>
</head>
<body>
  <article>
{{{content}}}
  </article>
</body>
</html>
`;
}

export function getDefaultIndexTemplate(): string {
  return `<!DOCTYPE html>
<html lang="{{site.language}}">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>{{site.title}}</title>
  <meta name="description" content="{{site.description}}">
{{#if feed}}
  <link rel="alternate" type="application/rss+xml" title="{{site.title}}" href="{{feed}}">
{{/if}}
</head>
<body>
  <header>
    <h1>{{site.title}}</h1>
    <p>{{site.description}}</p>
  </header>
  <ul class="article_list">
{{#each articles}}
    <li>
      <a href="{{href}}">{{title}}</a>{{#if date}} <time datetime="{{date}}">{{date}}</time>{{/if}}
{{#if description}}
      <p>{{description}}</p>
{{/if}}
    </li>
{{/each}}
  </ul>
{{#if feed}}
  <footer><a href="{{feed}}">RSS</a></footer>
{{/if}}
</body>
</html>
`;
}

export function getDefaultFeedTemplate(): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0" xmlns:atom="http://www.w3.org/2005/Atom">
  <channel>
    <title>{{site.title}}</title>
    <link>{{site.url}}</link>
    <description>{{site.description}}</description>
    <language>{{site.language}}</language>
    <atom:link href="{{feedUrl}}" rel="self" type="application/rss+xml"/>
    <lastBuildDate>{{lastBuildDate}}</lastBuildDate>
{{#each items}}
    <item>
      <title>{{title}}</title>
      <link>{{link}}</link>
      <description>{{description}}</description>
      <guid isPermaLink="true">{{link}}</guid>
{{#if pubDate}}
      <pubDate>{{pubDate}}</pubDate>
{{/if}}
    </item>
{{/each}}
  </channel>
</rss>
`;
}
