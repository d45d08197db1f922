export { createArchive } from "./archive";
export {
  packageBook,
  layoutBook,
  identifierFor,
  bookTitle,
  type BookContent,
  type EpubFile,
} from "./package";
export { toRoman } from "./roman";
