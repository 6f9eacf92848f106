export { parseSample, parseSamplePair, parseNestedArrays, parseGroups } from './parsers';
