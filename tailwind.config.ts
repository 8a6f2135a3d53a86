import type { Config } from "tailwindcss";

const config: Config = {
  content: {
    relative: true,
    files: ["./apps/frontend/index.html", "./apps/frontend/src/**/*.{ts,tsx}"]
  },
  theme: {
    extend: {
      colors: {
        brand: {
          50: "#f5f7ff",
          100: "#e7ecff",
          200: "#c5d2ff",
          300: "#9ab0ff",
          400: "#6b86ff",
          500: "#3f5dff",
          600: "#2340e6",
          700: "#1a30aa",
          800: "#131f73",
          900: "#0b1240"
        }
      },
      borderRadius: {
        xl: "1.25rem"
      }
    }
  },
  future: {
    hoverOnlyWhenSupported: true
  }
};

export default config;
