import mongoose from "mongoose";

const DEFAULT_URI = "mongodb://127.0.0.1:27017/datasets?replicaSet=rs0";

// Multi-document transactions need a replica set (or sharded cluster).
const connectDB = async () => {
  try {

    mongoose.set("strictQuery", true)
    const conn = await mongoose.connect(process.env.MONGODB_URI || DEFAULT_URI)

    console.log(`MongoDB Connected: ${conn.connection.host}`);

  } catch (error) {

    console.log(`Connection error: ${error} on Worker process: ${process.pid}`)
    process.exit(1);

  }
};

export default connectDB;
