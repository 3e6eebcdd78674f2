import { MongoClient, type Collection, type MongoClientOptions } from "mongodb";
import { logger } from "../utils/logger";
import type { AuditDocument } from "../types/audit";

export interface MongoConnection {
  client: MongoClient;
  collection: Collection<AuditDocument>;
}

const CONNECT_TIMEOUT_MS = 10_000;

/**
 * `socketTimeoutMs` bounds each operation on the wire, inserts included.
 */
export function mongoClientOptions(socketTimeoutMs?: number): MongoClientOptions {
  return {
    serverSelectionTimeoutMS: CONNECT_TIMEOUT_MS,
    connectTimeoutMS: CONNECT_TIMEOUT_MS,
    socketTimeoutMS: socketTimeoutMs,
  };
}

/**
 * Connects and pings once so a bad URI or unreachable cluster stops startup.
 */
export async function connectMongo(options: {
  uri: string;
  database: string;
  collection: string;
  socketTimeoutMs?: number;
}): Promise<MongoConnection> {
  const client = new MongoClient(options.uri, mongoClientOptions(options.socketTimeoutMs));

  await client.connect();
  await client.db(options.database).command({ ping: 1 });

  logger.info(
    { database: options.database, collection: options.collection },
    "connected to MongoDB",
  );

  return {
    client,
    collection: client.db(options.database).collection<AuditDocument>(options.collection),
  };
}
