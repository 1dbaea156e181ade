/**
 * HTML views: the application index and the HTMX partial for one application's state.
 */

import type { AppState } from "../../src/lib/canary/index.js";

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(value: string | number): string {
  return String(value).replace(/[&<>"']/g, (c) => HTML_ESCAPES[c] ?? c);
}

function appPath(name: string): string {
  return `/app/${encodeURIComponent(name)}`;
}

/** HTMX attributes that load an application partial into the `#app` slot. */
function swapInto(path: string): string {
  return `hx-get="${escapeHtml(path)}" hx-target="#app" hx-swap="outerHTML"`;
}

export function renderIndex(apps: string[], namespace: string): string {
  const items = apps.length
    ? apps
        .map((a) => `<li><a href="${escapeHtml(appPath(a))}" ${swapInto(appPath(a))}>${escapeHtml(a)}</a></li>`)
        .join("\n      ")
    : `<li>No applications in namespace ${escapeHtml(namespace)}</li>`;
  return `<!DOCTYPE html>
<html><head><meta charset="utf-8"><title>Canary switch</title>
<script src="https://unpkg.com/htmx.org@1.9.12"></script></head>
<body style="font-family:system-ui;max-width:800px;margin:40px auto;padding:20px">
  <h1>Applications</h1>
  <form action="/app" method="get" hx-get="/app" hx-target="#app" hx-swap="outerHTML"><input name="name" placeholder="application"><button>Open</button></form>
  <ul>
      ${items}
  </ul>
  <div id="app"></div>
</body></html>`;
}

/** Partial swapped into the page by HTMX after every read or mutation. */
export function renderApp(name: string, state: AppState): string {
  const base = escapeHtml(appPath(name));
  const toggle = state.canaryEnabled
    ? `<button hx-get="${base}/set_canary?enabled=false" hx-target="#app" hx-swap="outerHTML">Disable canary traffic</button>`
    : `<button hx-get="${base}/set_canary?enabled=true" hx-target="#app" hx-swap="outerHTML">Enable canary traffic</button>`;
  const deployments = state.deployments
    .map(
      (d) =>
        `<tr><td>${escapeHtml(d.name)}</td><td>${escapeHtml(d.track)}</td><td>${escapeHtml(d.image)}</td><td>${d.availableReplicas}/${d.replicas}</td></tr>`
    )
    .join("");
  const endpoints = state.endpoints
    .map((e) => `<tr><td>${escapeHtml(e.targetInstance)}</td><td>${escapeHtml(e.address)}</td></tr>`)
    .join("");
  return `<div id="app">
  <h2>${escapeHtml(name)}</h2>
  <p>Canary traffic: <strong>${state.canaryEnabled ? "enabled" : "disabled"}</strong> ${toggle}</p>
  <table><thead><tr><th>Deployment</th><th>Track</th><th>Image</th><th>Available</th></tr></thead><tbody>${deployments}</tbody></table>
  <table><thead><tr><th>Pod</th><th>IP</th></tr></thead><tbody>${endpoints}</tbody></table>
  <form hx-post="${base}/create_canary" hx-target="#app" hx-swap="outerHTML">
    <input name="tag" placeholder="image tag" required>
    <input name="replicas" type="number" min="0" value="1">
    <button>Create canary</button>
  </form>
</div>`;
}
