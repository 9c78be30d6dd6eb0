export * from "./access_caps";
export * from "./address_parser";
export * from "./address_space";
export * from "./behavior";
export * from "./behavior_registry";
export * from "./bitrange";
export * from "./bus";
export * from "./compiler";
export * from "./decoder";
export * from "./decoder_vhdl";
export * from "./errors";
export * from "./field";
export * from "./field_constant";
export * from "./field_control";
export * from "./field_flag";
export * from "./field_request";
export * from "./field_status";
export * from "./field_stream";
export * from "./masked_address";
export * from "./options";
export * from "./protocol";
export * from "./regfile";
export * from "./regfile_config";
export * from "./regfile_xml";
export * from "./register";
export * from "./report";
