import { MongoClient } from "mongodb";

export const createMongoClient = async (
  mongoUri: string,
  serverSelectionTimeoutMS = 5000
): Promise<MongoClient> => {
  const client = new MongoClient(mongoUri, { serverSelectionTimeoutMS });
  await client.connect();
  return client;
};
