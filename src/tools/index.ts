/**
 * Catalog tools
 */

export {
  SearchByTitleTool,
  SearchByGenreTool,
  SearchByRatingTool,
  SearchByActorTool,
  SearchFilmsTool,
  createFilmTools,
} from './film-tools.js';

export {
  describeCall,
  formatFilm,
  formatFilms,
  formatOutcome,
  formatPlanResult,
} from './format.js';
