export {
	createToolMediator,
	type HandleOptions,
	type ToolMediator,
	type ToolMediatorOptions,
	type ToolRequest,
} from './mediator.js';
