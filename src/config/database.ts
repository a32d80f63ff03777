import mongoose from "mongoose";
import { logger } from "./logger";

const options: mongoose.ConnectOptions = {
	autoIndex: true,
	maxPoolSize: 10,
	serverSelectionTimeoutMS: 5000,
	socketTimeoutMS: 45000,
	family: 4,
};

export async function connectDB(uri: string): Promise<void> {
	mongoose.connection.on("connected", () => {
		logger.info("MongoDB connected successfully");
	});

	mongoose.connection.on("error", (error) => {
		logger.error("MongoDB connection error:", error);
	});

	mongoose.connection.on("disconnected", () => {
		logger.warn("MongoDB disconnected. Attempting to reconnect...");
	});

	try {
		await mongoose.connect(uri, options);
	} catch (error) {
		logger.error("Failed to connect to MongoDB:", error);
		throw error;
	}
}

export async function disconnectDB(): Promise<void> {
	await mongoose.connection.close();
	logger.info("MongoDB connection closed");
}
