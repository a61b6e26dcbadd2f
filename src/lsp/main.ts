#!/usr/bin/env node
// src/lsp/main.ts
//
// `quill-lsp` entry: language server over the transport named on the command
// line (--stdio, --node-ipc, --socket=<port>).

import { createConnection, ProposedFeatures } from "vscode-languageserver/node";

import { createQuillServer } from "./server";

const connection = createConnection(ProposedFeatures.all);
createQuillServer(connection);
connection.listen();
