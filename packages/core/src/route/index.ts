export { isGlob, hasGroupSyntax, classifyTarget, expandInputs } from './targets'
