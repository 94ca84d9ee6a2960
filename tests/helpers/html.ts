export interface TeaserFixture {
  href: string;
  title: string;
  standfirst?: string;
  author?: string;
  /** ISO value for the `datetime` attribute */
  datetime?: string;
  /** Listing-format value for the `title` attribute */
  dateTitle?: string;
  premium?: boolean;
}

export function teaserHtml(teaser: TeaserFixture): string {
  const time =
    teaser.datetime || teaser.dateTitle
      ? `<div class="o-teaser__timestamp"><time${teaser.datetime ? ` datetime="${teaser.datetime}"` : ''}${
          teaser.dateTitle ? ` title="${teaser.dateTitle}"` : ''
        }>x</time></div>`
      : '';

  return `
    <li class="o-teaser-collection__item">
      <div class="o-teaser">
        ${teaser.premium ? '<span class="o-labels--premium">Premium</span>' : ''}
        ${teaser.author ? `<a class="o-teaser__tag">${teaser.author}</a>` : ''}
        <div class="o-teaser__heading"><a href="${teaser.href}">${teaser.title}</a></div>
        ${teaser.standfirst ? `<p class="o-teaser__standfirst">${teaser.standfirst}</p>` : ''}
        ${time}
      </div>
    </li>`;
}

export function listingHtml(teasers: TeaserFixture[]): string {
  return `<html><body><main><ul class="o-teaser-collection__list">${teasers
    .map(teaserHtml)
    .join('')}</ul></main></body></html>`;
}

export interface ArticleFixture {
  title?: string;
  paragraphs?: string[];
  author?: string;
  subtitle?: string;
  datetime?: string;
  image?: string;
  tags?: string[];
  related?: string[];
  paywall?: boolean;
}

export function articleHtml(fixture: ArticleFixture = {}): string {
  const title = fixture.title ?? 'Central banks hold rates steady';
  const paragraphs = fixture.paragraphs ?? [
    'Central banks across the region kept rates unchanged on Tuesday.',
    'Officials said inflation was moving back towards target.',
  ];

  return `<html>
    <head><title>${title} | Example News</title></head>
    <body>
      ${fixture.paywall ? '<div class="barrier-page">Subscribe to read</div>' : ''}
      <h1 class="n-content-header--headline">${title}</h1>
      ${fixture.subtitle ? `<p class="n-content-header--standfirst">${fixture.subtitle}</p>` : ''}
      ${fixture.author ? `<div class="n-content-header--byline"><a>${fixture.author}</a></div>` : ''}
      ${fixture.datetime ? `<time datetime="${fixture.datetime}">x</time>` : ''}
      ${fixture.image ? `<figure class="n-image"><img src="${fixture.image}"></figure>` : ''}
      <div class="n-content-body">${paragraphs.map((text) => `<p>${text}</p>`).join('')}</div>
      ${
        fixture.tags
          ? `<div class="topics">${fixture.tags.map((tag) => `<a href="/topic">${tag}</a>`).join('')}</div>`
          : ''
      }
      ${
        fixture.related
          ? `<div class="related-articles">${fixture.related
              .map((href) => `<a href="${href}">Related</a>`)
              .join('')}</div>`
          : ''
      }
    </body>
  </html>`;
}
