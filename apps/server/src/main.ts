import { startServer } from "./index";

startServer().catch((err) => {
  console.error("FATAL:", err);
  process.exit(1);
});
