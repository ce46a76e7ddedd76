import type { ReactNode } from 'react';
import { APP_NAME, type FlashMessage, type User } from '@magic-chef/shared';
import { FlashMessages } from './FlashMessages.js';

export const HTMX_SRC = 'https://unpkg.com/htmx.org@2.0.4/dist/htmx.min.js';
export const STYLESHEET_HREF = 'https://unpkg.com/@picocss/pico@2.0.6/css/pico.min.css';

// Error responses still swap, so validation messages reach #flash-messages
const HTMX_CONFIG = {
  responseHandling: [
    { code: '204', swap: false },
    { code: '[23]..', swap: true },
    { code: '[45]..', swap: true, error: true },
  ],
};

interface LayoutProps {
  title: string;
  user: User | null;
  flash: readonly FlashMessage[];
  children: ReactNode;
}

export function Layout({ title, user, flash, children }: LayoutProps): JSX.Element {
  return (
    <html lang={user?.language ?? 'en'}>
      <head>
        <meta charSet="utf-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1" />
        <meta name="htmx-config" content={JSON.stringify(HTMX_CONFIG)} />
        <title>{`${title} · ${APP_NAME}`}</title>
        <link rel="stylesheet" href={STYLESHEET_HREF} />
        <script src={HTMX_SRC} defer></script>
      </head>
      <body>
        <header className="container">
          <nav>
            <ul>
              <li>
                <a href="/"><strong>{APP_NAME}</strong></a>
              </li>
            </ul>
            <ul>
              <li><a href="/search">Search</a></li>
              {user ? (
                <>
                  <li><a href="/recipes/new">New recipe</a></li>
                  <li><a href="/table">Table</a></li>
                  <li><a href="/ai">AI chef</a></li>
                  <li><a href="/digitiser">Digitiser</a></li>
                  <li><a href="/settings">{user.username}</a></li>
                  <li>
                    <form method="post" action="/auth/logout">
                      <button type="submit" className="outline">Log out</button>
                    </form>
                  </li>
                </>
              ) : (
                <>
                  <li><a href="/auth/login">Log in</a></li>
                  <li><a href="/auth/register">Register</a></li>
                </>
              )}
            </ul>
          </nav>
        </header>
        <main className="container">
          <div id="flash-messages">
            <FlashMessages messages={flash} />
          </div>
          {children}
        </main>
      </body>
    </html>
  );
}
