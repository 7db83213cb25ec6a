import dotenv from "dotenv";
import { createApp } from "./app";
import { getContentPackPath } from "./routes/definitions-helpers";

dotenv.config();

const app = createApp();

const PORT = process.env.PORT || 4000;
app.listen(PORT, () => {
  console.log(`Character rules server listening on port ${PORT} (content pack: ${getContentPackPath()})`);
});
