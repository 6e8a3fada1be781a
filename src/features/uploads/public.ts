// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/uploads/public`
 * Purpose: Single entrypoint for the uploads feature.
 * Scope: Re-exports the image pipeline.
 * Side-effects: none
 * @public
 */

export {
  type ImagePipelineDeps,
  processImageUpload,
  replaceImage,
} from "./services/imagePipeline";
