import React from 'react';

export type PageKey = 'markets' | 'products' | 'customers';

export const NAV_ITEMS: ReadonlyArray<{ key: PageKey; label: string; href: string }> = [
  { key: 'markets', label: 'Markets', href: '/markets' },
  { key: 'products', label: 'Product Search', href: '/products' },
  { key: 'customers', label: 'Customers & Orders', href: '/customers' },
];

export const APP_TITLE = 'MN MarketLink';
export const APP_TAGLINE =
  'Browse local farmers markets, discover products, and review customer pre-orders.';

interface LayoutProps {
  /** Highlighted navigation entry; omitted on error pages */
  page?: PageKey;
  children: React.ReactNode;
}

/**
 * Page shell: title, tagline and sidebar navigation
 */
export default function Layout({ page, children }: LayoutProps): React.JSX.Element {
  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1" />
        <title>{APP_TITLE}</title>
        <link rel="stylesheet" href="/static/app.css" />
      </head>
      <body>
        <div className="app">
          <nav className="sidebar" aria-label="Navigation">
            <h2 className="sidebar-title">Navigation</h2>
            <ul>
              {NAV_ITEMS.map((item) => (
                <li key={item.key}>
                  <a
                    href={item.href}
                    className={item.key === page ? 'nav-link active' : 'nav-link'}
                    aria-current={item.key === page ? 'page' : undefined}
                  >
                    {item.label}
                  </a>
                </li>
              ))}
            </ul>
          </nav>
          <main className="content">
            <h1>{APP_TITLE}</h1>
            <p className="tagline">{APP_TAGLINE}</p>
            {children}
          </main>
        </div>
      </body>
    </html>
  );
}
