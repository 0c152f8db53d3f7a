#!/usr/bin/env node
import "dotenv/config";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createBrokerServer } from "./server.js";

const { server } = createBrokerServer();

const transport = new StdioServerTransport();
await server.connect(transport);
