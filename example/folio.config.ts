import { defineConfig } from "../src/config";

export default defineConfig({
  title: "Notes from the Terminal",
  author: "Example Author",
  language: "en",
  theme_rtl: false,
  theme_inverted: false,
  custom_stylesheets: ["assets/custom.css"],
  title_format: "{{ title }} | {{ site }}",
  toc: true,
});
