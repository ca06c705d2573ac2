export {
  ManifestResolver,
  renderRequirements,
  REQUIREMENTS_FILE,
  PYPROJECT_FILE,
  EXTRACTED_DEPS_FILE,
  type ManifestResolverOptions
} from './resolver.js'
export {
  extractRequirements,
  extractPyprojectDependencies,
  distributionName,
  type PyprojectExtraction
} from './extract.js'
