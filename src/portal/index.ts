/**
 * Landing Page
 * Served at `/`: a single form that opens any address through the proxy
 */

import { escapeAttribute } from 'entities';

// HTML template for the landing page
export function renderLandingPage(proxyBasePath: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>Web Proxy</title>
  <style>
    * {
      box-sizing: border-box;
      margin: 0;
      padding: 0;
    }

    body {
      font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, Helvetica, Arial, sans-serif;
      background: linear-gradient(135deg, #1a1a2e 0%, #16213e 50%, #0f3460 100%);
      min-height: 100vh;
      color: #fff;
      padding: 20px;
    }

    .container {
      max-width: 600px;
      margin: 0 auto;
      padding-top: 15vh;
      text-align: center;
    }

    h1 {
      font-size: 28px;
      margin-bottom: 24px;
    }

    form {
      display: flex;
      gap: 8px;
    }

    input[type="text"] {
      flex: 1;
      padding: 12px;
      border-radius: 8px;
      border: none;
      font-size: 16px;
    }

    button {
      padding: 12px 20px;
      border-radius: 8px;
      border: none;
      background: #e94560;
      color: #fff;
      font-size: 16px;
      cursor: pointer;
    }

    .hint {
      margin-top: 16px;
      font-size: 14px;
      opacity: 0.7;
    }
  </style>
</head>
<body>
  <div class="container">
    <h1>Web Proxy</h1>
    <form method="get" action="${escapeAttribute(proxyBasePath)}">
      <input type="text" name="url" placeholder="example.com" autofocus required>
      <button type="submit">Go</button>
    </form>
    <p class="hint">Pages, styles and scripts are fetched by this server and their links rewritten to stay on it.</p>
  </div>
</body>
</html>
`;
}
