/**
 * mcp-seamcarve - FastMCP server for content-aware image resizing.
 * Shrinks images by seam carving, removing low-energy paths instead of scaling.
 */

import { FastMCP } from 'fastmcp';

import { ContentAwareResizeParams, executeContentAwareResize } from './tool.js';
import { loadConfig } from './utils/config.js';

const config = loadConfig();

// Create FastMCP server
const server = new FastMCP({
  name: 'mcp-seamcarve',
  version: '1.0.0',
  instructions: `
    Content-aware image resizing server using seam carving.
    Only shrinking is supported: target width/height must not exceed the source image.
    Use outputType to control whether results are returned as files, base64, or both.
  `,
});

// Register the content_aware_resize tool
server.addTool({
  name: 'content_aware_resize',
  description: 'Shrink an image to a target width and/or height with seam carving, preserving edges and salient content better than uniform scaling. Width is reduced before height.',
  parameters: ContentAwareResizeParams,
  annotations: {
    title: 'Content-Aware Resize',
    readOnlyHint: false,
    openWorldHint: false,
  },
  execute: (args, context) => executeContentAwareResize(args, context, config),
});

// Start server
await server.start({
  transportType: 'stdio',
});
