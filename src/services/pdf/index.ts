export type { CharacterStreamProvider, TextRun } from './characterStream';
export {
  downloadPdf,
  isBoldFontName,
  pdfCharacterStream,
  runsToCharacters,
} from './characterStream';
