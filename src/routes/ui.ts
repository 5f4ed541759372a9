/**
 * Participant page
 *
 * A single Alpine.js page driving the session API. Entry URL parameters
 * (PROLIFIC_PID and friends) are forwarded on session start; without an
 * external id the page asks for an email first.
 *
 * Routes:
 * - GET / - listening test page
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { LocaleMessages } from '../trials/locale.js';

const ALPINE_VERSION = '3.14.1';
const ALPINE_CDN_URL = `https://cdn.jsdelivr.net/npm/alpinejs@${ALPINE_VERSION}/dist/cdn.min.js`;

/**
 * Alpine evaluates directive expressions with Function(), hence
 * 'unsafe-eval'. Remote stimuli may be served over https.
 */
export const UI_CSP_HEADER = [
  "default-src 'self'",
  `script-src 'self' 'unsafe-inline' 'unsafe-eval' https://cdn.jsdelivr.net`,
  "style-src 'self' 'unsafe-inline'",
  "media-src 'self' https:",
  "connect-src 'self'",
  "frame-ancestors 'none'",
  "form-action 'self'",
  "base-uri 'self'",
  "object-src 'none'",
].join('; ');

export interface PageOptions {
  language: string;
  messages: LocaleMessages;
  customCss: string | null;
}

/**
 * JSON safe to embed inside a <script> element
 */
export function embedJson(value: unknown): string {
  return JSON.stringify(value)
    .replace(/</g, '\\u003c')
    .replace(/>/g, '\\u003e')
    .replace(/&/g, '\\u0026')
    .replace(/\u2028/g, '\\u2028')
    .replace(/\u2029/g, '\\u2029');
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/** Keeps study CSS from closing the style element */
function embedCss(css: string): string {
  return css.replace(/<\/style/gi, '<\\/style');
}

export function renderPage({ language, messages, customCss }: PageOptions): string {
  return `<!DOCTYPE html>
<html lang="${escapeHtml(language)}">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(messages.page_title)}</title>
  <script defer src="${ALPINE_CDN_URL}"></script>
  <style>
    * { box-sizing: border-box; }
    body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; background: #f5f5f5; color: #333; line-height: 1.6; margin: 0; }
    main { max-width: 860px; margin: 0 auto; padding: 24px; }
    .card { background: #fff; border-radius: 8px; padding: 20px; margin-bottom: 16px; box-shadow: 0 1px 3px rgba(0,0,0,0.1); }
    .notice { background: #fff4e5; border-left: 4px solid #f0a020; padding: 12px; margin-bottom: 16px; }
    .hint { background: #e8f4fd; border-left: 4px solid #2b7bbf; padding: 12px; }
    .progress { color: #666; font-size: 14px; }
    .audio-row { display: flex; gap: 24px; flex-wrap: wrap; }
    .audio-row figure { margin: 0; }
    .played { color: #2e7d32; font-size: 13px; }
    .scale { display: flex; flex-direction: column; gap: 6px; margin: 12px 0; }
    button { background: #1a1a2e; color: #fff; border: none; border-radius: 4px; padding: 10px 20px; font-size: 15px; cursor: pointer; }
    button:disabled { opacity: 0.5; cursor: default; }
    input[type=email] { padding: 8px; font-size: 15px; width: 320px; max-width: 100%; }
  </style>
  ${customCss ? `<style>${embedCss(customCss)}</style>` : ''}
</head>
<body>
  <main x-data="listeningTest()" x-init="init()">
    <div class="notice" x-show="notice" x-text="notice"></div>

    <template x-if="view && view.status === 'unidentified'">
      <section class="card">
        <p x-text="messages.identity_prompt"></p>
        <label><span x-text="messages.email_label"></span><br>
          <input type="email" x-model="email" @keyup.enter="identify()">
        </label>
        <p><button :disabled="busy" @click="identify()" x-text="messages.start_button"></button></p>
      </section>
    </template>

    <template x-if="view && view.trial">
      <section class="card">
        <p class="progress" x-text="view.progress ? view.progress.label : ''"></p>
        <h2 x-text="view.trial.instructions.title"></h2>
        <template x-for="paragraph in view.trial.instructions.paragraphs">
          <p x-text="paragraph"></p>
        </template>
        <ul>
          <template x-for="point in view.trial.instructions.points">
            <li x-text="point"></li>
          </template>
        </ul>
        <p class="hint" x-show="view.trial.instructions.hint" x-text="view.trial.instructions.hint"></p>

        <div class="audio-row">
          <figure x-show="view.trial.reference_audio">
            <figcaption x-text="messages.reference_label"></figcaption>
            <audio controls preload="auto" :src="view.trial.reference_audio" @ended="played('reference')"></audio>
            <div class="played" x-show="view.trial.played.reference">&#10003;</div>
          </figure>
          <figure>
            <figcaption x-text="view.trial.reference_audio ? messages.target_label : messages.single_target_label"></figcaption>
            <audio controls preload="auto" :src="view.trial.target_audio" @ended="played('target')"></audio>
            <div class="played" x-show="view.trial.played.target">&#10003;</div>
          </figure>
        </div>

        <p x-show="view.trial.edited_transcript !== null">
          <strong x-text="messages.edited_transcript_label"></strong>
          <span x-text="view.trial.edited_transcript"></span>
        </p>

        <fieldset class="scale">
          <legend x-text="messages.score_label"></legend>
          <template x-for="option in view.trial.scale.options">
            <label><input type="radio" name="score" :value="option.value" x-model.number="score"> <span x-text="option.label"></span></label>
          </template>
        </fieldset>

        <template x-if="view.trial.editing_scale">
          <fieldset class="scale">
            <legend x-text="messages.editing_score_label"></legend>
            <template x-for="option in view.trial.editing_scale.options">
              <label><input type="radio" name="editing_score" :value="option.value" x-model.number="editingScore"> <span x-text="option.label"></span></label>
            </template>
          </fieldset>
        </template>

        <button :disabled="busy" @click="submit()" x-text="messages.submit_button"></button>
      </section>
    </template>

    <template x-if="view && view.completion">
      <section class="card">
        <p x-text="view.completion.message"></p>
        <p x-show="view.completion.redirect_url">
          <a :href="view.completion.redirect_url"><button x-text="messages.return_button"></button></a>
        </p>
      </section>
    </template>
  </main>

  <script>
    const MESSAGES = ${embedJson(messages)};

    function listeningTest() {
      return {
        messages: MESSAGES,
        view: null,
        notice: '',
        email: '',
        score: null,
        editingScore: null,
        busy: false,

        async init() {
          const urlParams = Object.fromEntries(new URLSearchParams(window.location.search));
          await this.call('/v1/sessions', { url_params: urlParams });
        },

        async call(path, body) {
          this.busy = true;
          try {
            const res = await fetch(path, {
              method: 'POST',
              headers: { 'Content-Type': 'application/json' },
              body: JSON.stringify(body),
            });
            const data = await res.json();
            if (!res.ok) {
              this.notice = data.message || this.messages.persist_failed;
              return;
            }
            this.apply(data);
          } catch (e) {
            this.notice = this.messages.persist_failed;
          } finally {
            this.busy = false;
          }
        },

        apply(data) {
          const outcome = 'view' in data ? data : { accepted: true, view: data };
          const previous = this.view && this.view.trial ? this.view.trial.index : null;
          this.view = outcome.view;
          if ('accepted' in outcome) {
            this.notice = outcome.accepted ? '' : outcome.message;
          }
          const trial = this.view.trial;
          if (trial && trial.index !== previous) {
            this.score = null;
            this.editingScore = null;
          }
        },

        identify() {
          return this.call('/v1/sessions/' + this.view.session_id + '/identity', { email: this.email });
        },

        played(slot) {
          return this.call('/v1/sessions/' + this.view.session_id + '/playback', {
            trial_index: this.view.trial.index,
            slot,
          });
        },

        submit() {
          const body = { trial_index: this.view.trial.index, score: this.score };
          if (this.view.trial.editing_scale) {
            body.editing_score = this.editingScore;
          }
          return this.call('/v1/sessions/' + this.view.session_id + '/responses', body);
        },
      };
    }
  </script>
</body>
</html>`;
}

export async function uiRoutes(app: FastifyInstance, options: PageOptions): Promise<void> {
  const page = renderPage(options);

  app.get('/', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply
      .type('text/html; charset=utf-8')
      .header('Content-Security-Policy', UI_CSP_HEADER)
      .header('X-Content-Type-Options', 'nosniff')
      .header('X-Frame-Options', 'DENY')
      .header('Referrer-Policy', 'no-referrer')
      .send(page);
  });
}
