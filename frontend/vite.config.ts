import { defineConfig } from "vite";
import react from "@vitejs/plugin-react";
import tailwindcss from "@tailwindcss/vite";

export default defineConfig({
  plugins: [react(), tailwindcss()],
  server: {
    port: 5173,
    proxy: {
      // Proxy API calls to the Express backend in dev
      "/bills": "http://localhost:8000",
      "/health": "http://localhost:8000",
    },
  },
});
