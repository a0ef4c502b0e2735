import 'dotenv/config'
import { buildApp } from "./app";
import connectDB from "./database";

const port = Number(process.env.PORT) || 3001;
const host = "0.0.0.0";

const start = async () => {
  await connectDB();

  buildApp().listen(port, host, () => {
    console.log(`Listening on port ${port}`);
  });
};

start().catch((err) => {
  console.error("Failed to start", err);
  process.exit(1);
});
