// The parser entry point, imported directly so the package index does not
// run its self-test on load.
declare module "pdf-parse/lib/pdf-parse.js" {
  import pdf from "pdf-parse";
  export default pdf;
}

declare module "*.css";
