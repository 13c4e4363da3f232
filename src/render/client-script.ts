/**
 * Browser-side search for the generated page. Reads the episodes from the JSON data block and
 * re-renders the list on every keystroke. Every value is HTML-escaped before it reaches innerHTML.
 */
export const CLIENT_SCRIPT = `
(function () {
  var dataElement = document.getElementById('episodes-data');
  var allEpisodes = dataElement ? JSON.parse(dataElement.textContent || '[]') : [];
  var filteredEpisodes = allEpisodes.slice();

  function escapeHtml(value) {
    return String(value == null ? '' : value)
      .replace(/&/g, '&amp;')
      .replace(/</g, '&lt;')
      .replace(/>/g, '&gt;')
      .replace(/"/g, '&quot;')
      .replace(/'/g, '&#39;');
  }

  function safeUrl(value) {
    var url = String(value == null ? '' : value).trim();
    var scheme = url.replace(/[\\u0000-\\u0020]/g, '').toLowerCase();
    return /^(javascript|data|vbscript):/.test(scheme) ? '#' : url;
  }

  function countLinks(episodes) {
    return episodes.reduce(function (sum, episode) {
      return sum + episode.links.length;
    }, 0);
  }

  function matches(episode, term) {
    var episodeNumber = String(episode.episodeNumber == null ? '' : episode.episodeNumber);
    var title = (episode.title || '').toLowerCase();
    var podcastTitle = (episode.podcastTitle || '').toLowerCase();

    if (episodeNumber.indexOf(term) !== -1 || title.indexOf(term) !== -1 || podcastTitle.indexOf(term) !== -1) {
      return true;
    }

    return episode.links.some(function (link) {
      return (link.text || '').toLowerCase().indexOf(term) !== -1 ||
        (link.url || '').toLowerCase().indexOf(term) !== -1;
    });
  }

  function formatDate(value) {
    var date = new Date(value);
    if (isNaN(date.getTime())) return escapeHtml(value);
    return date.toLocaleDateString('pt-BR', { day: '2-digit', month: 'long', year: 'numeric' });
  }

  function renderLink(link) {
    return '<a href="' + escapeHtml(safeUrl(link.url)) + '" target="_blank" rel="noopener" class="link-item">' +
      '<span class="link-icon">🔗</span>' +
      '<span class="link-text">' + escapeHtml(link.text || link.url) + '</span>' +
      '<span class="external-icon">↗</span>' +
      '</a>';
  }

  function renderEpisode(episode) {
    return '<div class="episode">' +
      '<div class="episode-header">' +
      '<div class="episode-meta">' +
      '<span class="podcast-badge">' + escapeHtml(episode.podcastTitle) + '</span>' +
      '<span class="episode-number">#' + escapeHtml(episode.episodeNumber) + '</span>' +
      '<span class="episode-date">' + formatDate(episode.date) + '</span>' +
      '</div>' +
      '<h2 class="episode-title">' +
      '<a href="' + escapeHtml(safeUrl(episode.permalink)) + '" target="_blank" rel="noopener">' + escapeHtml(episode.title) + '</a>' +
      '</h2>' +
      '</div>' +
      '<div class="links-section">' + episode.links.map(renderLink).join('') + '</div>' +
      '</div>';
  }

  function renderEpisodes(episodes) {
    var container = document.getElementById('episodesList');
    if (!container) return;

    if (episodes.length === 0) {
      container.innerHTML = '<div class="no-results">' +
        '<div class="no-results-icon">🔍</div>' +
        '<h2>Nenhum episódio encontrado</h2>' +
        '<p>Tente buscar por outro termo</p>' +
        '</div>';
      return;
    }

    container.innerHTML = episodes.map(renderEpisode).join('');
  }

  function updateStats() {
    var statsText = document.getElementById('statsText');
    if (!statsText) return;
    var total = allEpisodes.length;
    var showing = filteredEpisodes.length;

    if (showing === total) {
      statsText.textContent = total + ' episódio' + (total !== 1 ? 's' : '') + ' • ' +
        countLinks(allEpisodes) + ' links disponíveis';
    } else {
      statsText.textContent = 'Mostrando ' + showing + ' de ' + total + ' episódios • ' +
        countLinks(filteredEpisodes) + ' links';
    }
  }

  function applySearch(rawTerm) {
    var term = rawTerm.toLowerCase().trim();
    filteredEpisodes = term === ''
      ? allEpisodes.slice()
      : allEpisodes.filter(function (episode) { return matches(episode, term); });
    renderEpisodes(filteredEpisodes);
    updateStats();
  }

  document.addEventListener('DOMContentLoaded', function () {
    applySearch('');
    var searchBox = document.getElementById('searchBox');
    if (!searchBox) return;
    searchBox.addEventListener('input', function (event) {
      applySearch(event.target.value);
    });
  });
})();
`
