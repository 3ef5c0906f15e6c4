/**
 * Static Pages
 *
 * Routes:
 * - GET /about
 * - GET /contact
 */

import { Hono } from 'hono';
import type { HonoEnv } from '@/types/hono';
import { aboutPage, contactPage } from '@/views/pages';
import { pageContext } from '@/views/layout';

const pages = new Hono<HonoEnv>();

pages.get('/about', (c) => c.html(aboutPage(pageContext(c))));

pages.get('/contact', (c) => c.html(contactPage(pageContext(c))));

export default pages;
