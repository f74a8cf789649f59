import { Router } from "express";

const LINKS: ReadonlyArray<[label: string, href: string]> = [
  ["Home", "/"],
  ["Hello", "/hello"],
  ["Health Ping", "/health"],
  ["JSON as TEXT", "/json-as-text"]
];

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;"
};

export const escapeHtml = (value: string): string => value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);

export const renderIndexPage = ({ clientIp, now }: { clientIp: string; now: Date }): string => {
  const items = LINKS.map(([label, href]) => `<li><a href="${href}">${label}</a></li>`).join("");
  return [
    "<h1>Hi there!</h1>",
    `<p>${now.toISOString()}</p>`,
    `<p>Your IP: ${escapeHtml(clientIp)}</p>`,
    `<ul>${items}</ul>`
  ].join("\n");
};

const router = Router();

router.get("/", (req, res) => {
  res.type("html").send(renderIndexPage({ clientIp: req.socket.remoteAddress ?? "", now: new Date() }));
});

router.get("/hello", (_req, res) => {
  res.type("text").send("Hello, World!\n");
});

// Serves JSON under a text content type; nosniff stops browsers from guessing otherwise.
router.get("/json-as-text", (_req, res) => {
  res.setHeader("Content-Type", "text/plain; charset=utf-8");
  res.setHeader("X-Content-Type-Options", "nosniff");
  res.status(200).send('{"status":"ok"}\n');
});

export default router;
