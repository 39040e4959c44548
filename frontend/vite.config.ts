import { defineConfig } from "vite";
import react from "@vitejs/plugin-react";

// The backend's CORS policy trusts exactly this origin.
const DEV_SERVER_PORT = 3000;

// https://vite.dev/config/
export default defineConfig({
  plugins: [react()],
  server: {
    port: DEV_SERVER_PORT,
    strictPort: true,
  },
});
