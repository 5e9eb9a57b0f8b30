import { includesEngine, includesTypedConfig } from "../../extensions.js";
import { capitalize, normalizeSource } from "../../text.js";
import type { TraversalExtension, TraversalNames } from "../../types.js";

export function siblingModules(extension: TraversalExtension): string[] {
  const modules: string[] = [];
  if (includesTypedConfig(extension)) {
    modules.push("config", "params");
  }
  if (includesEngine(extension)) {
    modules.push("engine");
  }
  return modules.sort();
}

function buildModuleDeclarations(names: TraversalNames, extension: TraversalExtension): string | null {
  const modules = siblingModules(extension);
  if (modules.length === 0) return null;
  const declarations = modules.map((entry) => `mod ${entry};`);
  const exports = modules.map((entry) => `pub use ${entry}::${names.pascal}${capitalize(entry)};`);
  return `${declarations.join("\n")}\n\n${exports.join("\n")}`;
}

// state built once by the builder and shared by the service with every model it creates
function sharedState(names: TraversalNames, extension: TraversalExtension): { field: string; fieldType: string } {
  return includesEngine(extension)
    ? { field: "engine", fieldType: names.engine }
    : { field: "config", fieldType: names.config };
}

function buildImports(): string {
  return `use std::sync::Arc;

use routee_compass_core::{
    algorithm::search::SearchTree,
    model::{
        network::{Edge, Vertex},
        state::{InputFeature, StateModel, StateVariable, StateVariableConfig},
        traversal::{
            TraversalModel, TraversalModelBuilder, TraversalModelError, TraversalModelService,
        },
    },
};`;
}

function buildBuilder(names: TraversalNames, extension: TraversalExtension): string {
  if (extension === "none") {
    return `pub struct ${names.builder} {}

impl TraversalModelBuilder for ${names.builder} {
    fn build(
        &self,
        _params: &serde_json::Value,
    ) -> Result<Arc<dyn TraversalModelService>, TraversalModelError> {
        let service = ${names.service}::new();
        Ok(Arc::new(service))
    }
}`;
  }

  if (extension === "typed-config") {
    return `pub struct ${names.builder} {}

impl TraversalModelBuilder for ${names.builder} {
    fn build(
        &self,
        value: &serde_json::Value,
    ) -> Result<Arc<dyn TraversalModelService>, TraversalModelError> {
        let config: ${names.config} = serde_json::from_value(value.clone()).map_err(|e| {
            let msg = format!("failure reading config for ${names.pascal} builder: {e}");
            TraversalModelError::BuildError(msg)
        })?;
        let service = ${names.service}::new(config);
        Ok(Arc::new(service))
    }
}`;
  }

  return `pub struct ${names.builder} {}

impl TraversalModelBuilder for ${names.builder} {
    fn build(
        &self,
        value: &serde_json::Value,
    ) -> Result<Arc<dyn TraversalModelService>, TraversalModelError> {
        let config: ${names.config} = serde_json::from_value(value.clone()).map_err(|e| {
            let msg = format!("failure reading config for ${names.pascal} builder: {e}");
            TraversalModelError::BuildError(msg)
        })?;
        let engine = ${names.engine}::try_from(config).map_err(|e| {
            let msg = format!("failure building engine from config for ${names.pascal} builder: {e}");
            TraversalModelError::BuildError(msg)
        })?;
        let service = ${names.service}::new(engine);
        Ok(Arc::new(service))
    }
}`;
}

function buildService(names: TraversalNames, extension: TraversalExtension): string {
  if (extension === "none") {
    return `pub struct ${names.service} {}

impl ${names.service} {
    pub fn new() -> Self {
        Self {}
    }
}

impl TraversalModelService for ${names.service} {
    fn build(
        &self,
        _query: &serde_json::Value,
    ) -> Result<Arc<dyn TraversalModel>, TraversalModelError> {
        let model = ${names.model}::new();
        Ok(Arc::new(model))
    }
}`;
  }

  const { field, fieldType } = sharedState(names, extension);
  return `pub struct ${names.service} {
    ${field}: Arc<${fieldType}>,
}

impl ${names.service} {
    pub fn new(${field}: ${fieldType}) -> Self {
        Self {
            ${field}: Arc::new(${field}),
        }
    }
}

impl TraversalModelService for ${names.service} {
    fn build(
        &self,
        query: &serde_json::Value,
    ) -> Result<Arc<dyn TraversalModel>, TraversalModelError> {
        let params: ${names.params} = serde_json::from_value(query.clone()).map_err(|e| {
            let msg = format!("failure reading params for ${names.pascal} service: {e}");
            TraversalModelError::BuildError(msg)
        })?;
        let model = ${names.model}::new(self.${field}.clone(), params);
        Ok(Arc::new(model))
    }
}`;
}

function buildModelStruct(names: TraversalNames, extension: TraversalExtension): string {
  if (extension === "none") {
    return `pub struct ${names.model} {}

impl ${names.model} {
    pub fn new() -> Self {
        Self {}
    }
}`;
  }

  const { field, fieldType } = sharedState(names, extension);
  return `pub struct ${names.model} {
    pub ${field}: Arc<${fieldType}>,
    pub params: ${names.params},
}

impl ${names.model} {
    pub fn new(${field}: Arc<${fieldType}>, params: ${names.params}) -> Self {
        // modify this and the struct definition if additional pre-processing
        // is required during model instantiation from query parameters.
        Self { ${field}, params }
    }
}`;
}

function buildModelImpl(names: TraversalNames): string {
  return `impl TraversalModel for ${names.model} {
    fn name(&self) -> String {
        "${names.model}".to_string()
    }

    fn input_features(&self) -> Vec<InputFeature> {
        todo!()
    }

    fn output_features(&self) -> Vec<(String, StateVariableConfig)> {
        todo!()
    }

    fn traverse_edge(
        &self,
        _trajectory: (&Vertex, &Edge, &Vertex),
        _state: &mut Vec<StateVariable>,
        _tree: &SearchTree,
        _state_model: &StateModel,
    ) -> Result<(), TraversalModelError> {
        todo!()
    }

    fn estimate_traversal(
        &self,
        _od: (&Vertex, &Vertex),
        _state: &mut Vec<StateVariable>,
        _tree: &SearchTree,
        _state_model: &StateModel,
    ) -> Result<(), TraversalModelError> {
        todo!()
    }
}`;
}

export function buildTraversalStub(names: TraversalNames, extension: TraversalExtension): string {
  const sections = [
    buildModuleDeclarations(names, extension),
    buildImports(),
    buildBuilder(names, extension),
    buildService(names, extension),
    buildModelStruct(names, extension),
    buildModelImpl(names)
  ].filter((section): section is string => section !== null);
  return normalizeSource(sections.join("\n\n"));
}
