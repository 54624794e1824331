#!/usr/bin/env node

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import dotenv from 'dotenv';

// Load environment variables from .env file if present
dotenv.config();

// Import tool registration functions
import { registerAuthTools } from './tools/auth.js';
import { registerCourseTools } from './tools/courses.js';
import { registerAssignmentTools } from './tools/assignments.js';
import { registerSubmissionTools } from './tools/submissions.js';
import { registerQuizTools } from './tools/quizzes.js';
import { registerTopicTools } from './tools/topics.js';
import { registerActivityTools } from './tools/activities.js';
import { registerRestrictionTools } from './tools/restrictions.js';
import { registerPageTools } from './tools/pages.js';
import { registerRubricTools } from './tools/rubric.js';
import { registerSkillTools } from './tools/skills.js';
import { registerFileTools } from './tools/files.js';

import { registerResources } from './resources.js';
import { getAppContext } from './context.js';

const SERVER_VERSION = '0.1.0';

async function main(): Promise<void> {
  const ctx = getAppContext();

  // Create the MCP server
  const server = new McpServer({
    name: 'paatshala',
    version: SERVER_VERSION,
  });

  // ==================== TOOLS ====================

  // Read tools (always active); each module adds its write tools when enabled
  registerAuthTools(server);
  registerCourseTools(server);
  registerAssignmentTools(server);
  registerSubmissionTools(server);
  registerQuizTools(server);
  registerTopicTools(server);
  registerActivityTools(server);
  registerRestrictionTools(server);
  registerRubricTools(server);
  registerSkillTools(server);
  registerFileTools(server);

  // Page creation (write only)
  registerPageTools(server);

  // ==================== RESOURCES ====================
  registerResources(server);

  // Create stdio transport and connect
  const transport = new StdioServerTransport();
  await server.connect(transport);

  // Log startup (to stderr to not interfere with MCP protocol on stdout)
  console.error(`Paatshala MCP Server v${SERVER_VERSION} started successfully`);
  console.error(`Connected to: ${ctx.config.baseUrl}`);
  console.error(`Output dir:   ${ctx.config.outputDir}`);
  if (!ctx.config.cookie && !(ctx.config.username && ctx.config.password)) {
    console.error('Auth:         no cookie or credentials configured; call paatshala_login first');
  }
  if (ctx.config.enableWriteTools) {
    console.error('Course edits: ENABLED (topics, activities, restrictions, pages)');
  } else {
    console.error('Course edits: DISABLED (set ENABLE_WRITE_TOOLS=true to edit topics, activities and restrictions)');
  }
}

// Run the server
main().catch((error) => {
  console.error('Fatal error starting server:', error);
  process.exit(1);
});
