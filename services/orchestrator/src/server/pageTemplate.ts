/**
 * Clip page markup served to the compositor's embeddable source
 */

import type { ClipDescriptor } from "@clipcast/shared";

export const EMBED_BASE_URL = "https://clips.twitch.tv/embed";
export const EMBED_PARENT = "localhost";

/** Delay after which a still-unloaded player is reported as gated */
export const CONTENT_WARNING_CHECK_MS = 4000;

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

export function embedUrl(clipId: string, nonce: string): string {
  const params = new URLSearchParams({ clip: clipId, nonce, autoplay: "true", parent: EMBED_PARENT });
  return `${EMBED_BASE_URL}?${params.toString()}`;
}

export function contentSecurityPolicy(nonce: string): string {
  return `script-src 'nonce-${nonce}' 'strict-dynamic'; object-src 'none'; base-uri 'none'; frame-ancestors 'self' https://clips.twitch.tv;`;
}

export const PAGE_CSS = `div {
  background-color: rgba(0, 113, 197, 1);
  margin: 0 auto;
  overflow: hidden;
}

#clip-embed {
  display: block;
}

.iframe-container {
  height: 1080px;
  position: relative;
  width: 1920px;
}

#clip-iframe {
  height: 100%;
  left: 0;
  position: absolute;
  top: 0;
  width: 100%;
}

#overlay-text {
  background-color: rgba(4, 34, 57, 0.7071);
  border-radius: 5px;
  color: #ffb809;
  left: 5%;
  opacity: 0.5;
  padding: 10px;
  position: absolute;
  top: 80%;
}

.line1 {
  font: normal 600 2em/1.2 "OpenDyslexic", "Open Sans", sans-serif;
}

.line2 {
  font: normal 400 1.5em/1 "OpenDyslexic", "Open Sans", sans-serif;
}

.line3 {
  font: italic 100 1em/1 "OpenDyslexic", "Open Sans", sans-serif;
}

#content-warning-notice {
  background-color: rgba(4, 34, 57, 0.9);
  border-radius: 5px;
  color: #ffb809;
  font: normal 600 1.5em/1.2 "Open Sans", sans-serif;
  left: 5%;
  padding: 10px;
  position: absolute;
  top: 10%;
}
`;

export type ClipPageInput = {
  clip: ClipDescriptor;
  gameName: string;
  nonce: string;
};

// Reports a player that never finished loading (usually a mature-content gate)
// and shows the result of the report on the overlay.
function pageScript(): string {
  return `
(() => {
  let loaded = false;
  let reported = false;
  const iframe = document.getElementById("clip-iframe");
  iframe.addEventListener("load", () => { loaded = true; });

  const notice = (text) => {
    const el = document.createElement("div");
    el.id = "content-warning-notice";
    el.textContent = text;
    document.body.appendChild(el);
    setTimeout(() => el.remove(), 10000);
  };

  const report = async (detectionMethod) => {
    if (reported) return;
    reported = true;
    try {
      const response = await fetch("/api/content-warning", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ detectionMethod, timestamp: new Date().toISOString() }),
      });
      const result = await response.json();
      notice(result.obsAutomation ? "Content warning: dismissing automatically" : "Content warning: interact with the source to continue");
    } catch (error) {
      notice("Content warning: interact with the source to continue");
    }
  };

  window.addEventListener("message", (event) => {
    const type = event.data && event.data.type;
    if (type === "content-warning" || type === "mature-content-gate") report("postMessage");
  });
  setTimeout(() => { if (!loaded) report("loading-delay"); }, ${CONTENT_WARNING_CHECK_MS});
})();
`;
}

export function renderClipPage({ clip, gameName, nonce }: ClipPageInput): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <link href="/index.css" rel="stylesheet" type="text/css">
  <title>Clipcast</title>
</head>
<body>
  <div id="clip-embed">
    <div class="iframe-container">
      <iframe allowfullscreen height="1080" width="1920" id="clip-iframe" title="Clipcast" src="${escapeHtml(embedUrl(clip.id, nonce))}"></iframe>
      <div class="overlay-text" id="overlay-text">
        <div class="line1">${escapeHtml(clip.broadcasterName)} doin' a ${escapeHtml(gameName)} stream</div>
        <div class="line2">${escapeHtml(clip.title)}</div>
        <div class="line3">by ${escapeHtml(clip.creatorName)}</div>
      </div>
    </div>
  </div>
  <script nonce="${nonce}">${pageScript()}</script>
</body>
</html>
`;
}

export function renderBlankPage(): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <title>Clipcast</title>
</head>
<body style="background: transparent; margin: 0"></body>
</html>
`;
}
