import type { Config } from "tailwindcss";

const config: Config = {
  content: ["./app/**/*.{ts,tsx}", "./components/**/*.{ts,tsx}"],
  theme: {
    extend: {
      colors: {
        canvas: "#070A12",
        slate: "#0E1423",
        electric: "#33D8FF",
        neon: "#6A7CFF",
        punch: "#FF6B6B",
      },
      boxShadow: {
        glow: "0 0 0 1px rgba(51,216,255,0.3), 0 20px 80px rgba(51,216,255,0.18)",
      },
    },
  },
  plugins: [],
};

export default config;
