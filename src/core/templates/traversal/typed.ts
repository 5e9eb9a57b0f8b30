import { normalizeSource } from "../../text.js";
import type { TraversalNames } from "../../types.js";

function buildSerdeStruct(typeName: string): string {
  return normalizeSource(`use serde::{Deserialize, Serialize};

#[derive(Deserialize, Serialize, Clone, Debug)]
pub struct ${typeName} {}
`);
}

/** Static configuration, read once by the builder from the model's JSON config section. */
export function buildConfigFile(names: TraversalNames): string {
  return buildSerdeStruct(names.config);
}

/** Per-query parameters, read by the service for every search request. */
export function buildParamsFile(names: TraversalNames): string {
  return buildSerdeStruct(names.params);
}

export function buildEngineFile(names: TraversalNames): string {
  return normalizeSource(`use super::${names.config};

use routee_compass_core::model::traversal::TraversalModelError;

pub struct ${names.engine} {}

impl TryFrom<${names.config}> for ${names.engine} {
    type Error = TraversalModelError;

    fn try_from(_config: ${names.config}) -> Result<Self, Self::Error> {
        todo!()
    }
}
`);
}
