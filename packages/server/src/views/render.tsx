import type { ReactElement } from 'react';
import { renderToStaticMarkup } from 'react-dom/server';
import type { FlashMessage, User } from '@magic-chef/shared';
import { FlashMessages } from './components/FlashMessages.js';
import { Layout } from './components/Layout.js';
import { ErrorPage } from './pages/ErrorPage.js';

export interface PageContext {
  title: string;
  user: User | null;
  flash: readonly FlashMessage[];
}

export function renderPage(page: ReactElement, context: PageContext): string {
  return `<!DOCTYPE html>${renderToStaticMarkup(
    <Layout title={context.title} user={context.user} flash={context.flash}>
      {page}
    </Layout>
  )}`;
}

/** HTMX fragment without the surrounding layout. */
export function renderPartial(element: ReactElement): string {
  return renderToStaticMarkup(element);
}

export function renderFlashFragment(messages: readonly FlashMessage[]): string {
  return renderPartial(<FlashMessages messages={messages} />);
}

export function renderErrorPage(status: number, message: string, user: User | null): string {
  return renderPage(<ErrorPage status={status} message={message} />, {
    title: status === 404 ? 'Not found' : 'Error',
    user,
    flash: [],
  });
}
